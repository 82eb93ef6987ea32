import { isDeepStrictEqual } from 'node:util';

import { logGame } from '../../logging.js';
import type { GameLogEntry } from '../../logging.js';
import { resolveAttack } from '../combat/combat-resolver.js';
import { calculateSplashDamage } from '../combat/splash-damage.js';
import { isRangedAttack } from '../combat/wound-bonus.js';
import { ReplayDivergenceError } from '../errors.js';
import type { RejectionCode } from '../errors.js';
import type { Game, GameCheckpoint } from '../game.js';
import { applyChanges } from '../history/change-replay.js';
import { findPathTo } from '../pathfinding/movement-planner.js';
import {
  advanceProgression,
  completeCurrentStep,
  getAllowedActionsForUnit,
  resolveActionStep
} from '../progression/action-progression.js';
import { calculateHealAmount, topUpUnitIfNeeded } from '../progression/top-up.js';
import type { ProgressionContext, TopUpResult } from '../progression/top-up.js';
import type { GameAction, GameMove, HexCoordinate, PathEdge, Unit, WorldChange, WorldData } from '../types.js';
import { axialDistance, coordinateKey, sameCoordinate, toCoordinate } from '../utils/grid.js';
import { cloneUnit, createUnit } from '../utils/units.js';
import { calculatePlayerIncome } from './income.js';

export type ActionResult =
  | { success: true; changes: WorldChange[]; reconstructedPath?: PathEdge[] }
  | { success: false; code: RejectionCode; error: string };

export type Rejection = Extract<ActionResult, { success: false }>;

export type BatchResult =
  | { success: true; moves: GameMove[] }
  | { success: false; code: RejectionCode; error: string; moveIndex: number };

export type DryRunResult = BatchResult;

type ActionOf<K extends GameAction['kind']> = Extract<GameAction, { kind: K }>;

// games currently evaluating a dry run; their moves are not logged
const speculative = new WeakSet<Game>();
// games evaluating a batch; entries wait until the batch commits or is rejected
const pendingLogs = new WeakMap<Game, GameLogEntry[]>();

function reject(code: RejectionCode, error: string): Rejection {
  return { success: false, code, error };
}

function log(game: Game, entry: GameLogEntry) {
  if (speculative.has(game)) return;
  const tagged = { gameId: game.gameId, ...entry };
  const pending = pendingLogs.get(game);
  if (pending) {
    pending.push(tagged);
  } else {
    logGame(game.logger, tagged);
  }
}

function flushLogs(game: Game, entries: readonly GameLogEntry[]) {
  for (const entry of entries) logGame(game.logger, entry);
}

function progressionContext(game: Game): ProgressionContext {
  return { world: game.world, rules: game.rules, turnCounter: game.turnCounter };
}

function formatPosition(coordinate: HexCoordinate) {
  return `(${coordinateKey(coordinate)})`;
}

/** The current player's unit at `coordinate`, refreshed for this turn. */
function activeUnitAt(game: Game, coordinate: HexCoordinate): TopUpResult | Rejection {
  const unit = game.world.unitAt(coordinate);
  if (!unit) return reject('no-unit', `no unit at ${formatPosition(coordinate)}`);
  if (unit.player !== game.currentPlayer) {
    return reject('not-your-turn', `unit at ${formatPosition(coordinate)} belongs to player ${unit.player}, not current player ${game.currentPlayer}`);
  }
  return topUpUnitIfNeeded(progressionContext(game), coordinate);
}

function isRejection(value: TopUpResult | Rejection): value is Rejection {
  return 'success' in value;
}

function slotClosed(unit: Unit, allowed: string[], action: string): Rejection {
  const open = allowed.length > 0 ? allowed.join(', ') : 'none';
  return reject('slot-closed', `unit at ${formatPosition(unit)} cannot ${action} now (allowed: ${open})`);
}

function applyMove(game: Game, action: ActionOf<'move'>): ActionResult {
  const active = activeUnitAt(game, action.from);
  if (isRejection(active)) return active;
  const { unit, changes } = active;
  const definition = game.rules.getUnitData(unit.unitType);

  const moveStep = resolveActionStep(unit, definition, 'move');
  const performed = moveStep !== undefined ? 'move' : 'retreat';
  const step = moveStep ?? resolveActionStep(unit, definition, 'retreat');
  if (step === undefined) return slotClosed(unit, getAllowedActionsForUnit(unit, definition), 'move');

  if (sameCoordinate(action.from, action.to)) {
    return reject('occupied', `unit is already at ${formatPosition(action.to)}`);
  }
  const path = findPathTo(game.world, game.rules, unit, action.to, { preventPassThrough: action.preventPassThrough });
  if (!path.success) {
    return reject(path.reason, `cannot move from ${formatPosition(action.from)} to ${formatPosition(action.to)}: ${path.reason}`);
  }

  const previousUnit = cloneUnit(unit);
  game.world.moveUnit(action.from, action.to);
  const updated = game.world.updateUnit(action.to, (draft) => {
    draft.distanceLeft = Math.max(0, draft.distanceLeft - path.cost);
    advanceProgression(draft, definition, performed, step);
    draft.lastActedTurn = game.turnCounter;
  });

  changes.push({ kind: 'unit:moved', previousUnit, updatedUnit: cloneUnit(updated) });
  return { success: true, changes, reconstructedPath: path.path };
}

function applyAttack(game: Game, action: ActionOf<'attack'>): ActionResult {
  const { world, rules } = game;
  const defender = world.unitAt(action.defender);
  if (!defender) return reject('no-unit', `no unit to attack at ${formatPosition(action.defender)}`);

  const active = activeUnitAt(game, action.attacker);
  if (isRejection(active)) return active;
  const { unit: attacker, changes } = active;
  if (defender.player === attacker.player) {
    return reject('cannot-attack', `unit at ${formatPosition(action.defender)} is not an enemy`);
  }

  const definition = rules.getUnitData(attacker.unitType);
  const step = resolveActionStep(attacker, definition, 'attack');
  if (step === undefined) return slotClosed(attacker, getAllowedActionsForUnit(attacker, definition), 'attack');
  if (!rules.canAttackType(attacker.unitType, defender.unitType)) {
    return reject('cannot-attack', `${definition.name} cannot attack ${rules.getUnitData(defender.unitType).name}`);
  }
  const distance = axialDistance(attacker, defender);
  if (distance > definition.attackRange) {
    return reject('out-of-range', `target is ${distance} away, range is ${definition.attackRange}`);
  }

  const attackerTile = world.tileAt(attacker);
  const defenderTile = world.tileAt(defender);
  if (!attackerTile || !defenderTile) return reject('no-tile', 'attacker and defender must stand on tiles');

  const previousAttacker = cloneUnit(attacker);
  const previousDefender = cloneUnit(defender);
  const rolls = resolveAttack(rules, { attacker, attackerTile, defender, defenderTile }, game.random);

  const damagedDefender = world.updateUnit(defender, (draft) => {
    draft.availableHealth = Math.max(0, draft.availableHealth - rolls.defenderDamage);
    draft.attackHistory.push({
      q: attacker.q,
      r: attacker.r,
      isRanged: isRangedAttack(attacker, defender),
      turnNumber: game.turnCounter
    });
  });
  const damagedAttacker = world.updateUnit(attacker, (draft) => {
    draft.availableHealth = Math.max(0, draft.availableHealth - rolls.attackerDamage);
    advanceProgression(draft, definition, 'attack', step);
    draft.lastActedTurn = game.turnCounter;
  });

  changes.push({
    kind: 'unit:damaged',
    previousUnit: previousDefender,
    updatedUnit: cloneUnit(damagedDefender),
    damage: rolls.defenderDamage
  });
  if (rolls.attackerDamage > 0) {
    changes.push({
      kind: 'unit:damaged',
      previousUnit: previousAttacker,
      updatedUnit: cloneUnit(damagedAttacker),
      damage: rolls.attackerDamage
    });
  } else {
    changes.push({ kind: 'unit:acted', previousUnit: previousAttacker, updatedUnit: cloneUnit(damagedAttacker) });
  }

  if (damagedDefender.availableHealth <= 0) {
    world.removeUnit(defender);
    changes.push({ kind: 'unit:killed', previousUnit: previousDefender });
  }
  const attackerKilled = damagedAttacker.availableHealth <= 0;
  if (attackerKilled) {
    world.removeUnit(attacker);
    changes.push({ kind: 'unit:killed', previousUnit: previousAttacker });
  }

  if (!attackerKilled) {
    const splash = calculateSplashDamage(rules, world, damagedAttacker, attackerTile, toCoordinate(defender), game.random);
    for (const target of splash) {
      const previousTarget = cloneUnit(target.unit);
      const damaged = world.updateUnit(target.unit, (draft) => {
        draft.availableHealth = Math.max(0, draft.availableHealth - target.damage);
      });
      changes.push({ kind: 'unit:damaged', previousUnit: previousTarget, updatedUnit: cloneUnit(damaged), damage: target.damage });
      if (damaged.availableHealth <= 0) {
        world.removeUnit(damaged);
        changes.push({ kind: 'unit:killed', previousUnit: previousTarget });
      }
    }
  }

  return { success: true, changes };
}

function applyBuild(game: Game, action: ActionOf<'build'>): ActionResult {
  const { world, rules, config } = game;
  const player = game.currentPlayer;
  const tile = world.tileAt(action.position);
  if (!tile) return reject('no-tile', `no tile at ${formatPosition(action.position)}`);
  if (tile.player !== player) {
    return reject('not-owner', `tile at ${formatPosition(action.position)} is not owned by player ${player}`);
  }
  if (!rules.hasUnitType(action.unitType)) return reject('not-buildable', `unknown unit type ${action.unitType}`);

  const terrain = rules.getTerrainData(tile.tileType);
  if (!terrain.buildableUnitIds.includes(action.unitType)) {
    return reject('not-buildable', `${terrain.name} cannot build unit type ${action.unitType}`);
  }
  if (config.allowedUnits && !config.allowedUnits.includes(action.unitType)) {
    return reject('unit-not-allowed', `unit type ${action.unitType} is not allowed in this game`);
  }
  if (tile.lastActedTurn >= game.turnCounter) {
    return reject('already-built', `tile at ${formatPosition(action.position)} already built this turn`);
  }
  if (world.unitAt(action.position)) return reject('occupied', `tile at ${formatPosition(action.position)} is occupied`);

  const definition = rules.getUnitData(action.unitType);
  const previousCoins = game.coinsOf(player);
  if (previousCoins < definition.coins) {
    return reject('insufficient-coins', `${definition.name} costs ${definition.coins}, player ${player} has ${previousCoins}`);
  }

  const unit = createUnit({
    q: tile.q,
    r: tile.r,
    player,
    unitType: action.unitType,
    availableHealth: definition.health,
    progressionStep: 1,
    distanceLeft: 0,
    lastActedTurn: game.turnCounter,
    lastToppedUpTurn: game.turnCounter
  });
  world.addUnit(unit);
  world.updateTile(tile, (draft) => {
    draft.lastActedTurn = game.turnCounter;
  });
  const newCoins = previousCoins - definition.coins;
  game.setCoins(player, newCoins);

  return {
    success: true,
    changes: [
      { kind: 'unit:built', unit: cloneUnit(unit), tile: toCoordinate(tile), coinsCost: definition.coins, playerCoins: newCoins },
      { kind: 'coins:changed', playerId: player, previousCoins, newCoins, reason: 'build' }
    ]
  };
}

function applyCapture(game: Game, action: ActionOf<'capture'>): ActionResult {
  const { world, rules } = game;
  const active = activeUnitAt(game, action.position);
  if (isRejection(active)) return active;
  const { unit, changes } = active;
  const definition = rules.getUnitData(unit.unitType);

  const step = resolveActionStep(unit, definition, 'capture');
  if (step === undefined) return slotClosed(unit, getAllowedActionsForUnit(unit, definition), 'capture');

  const tile = world.tileAt(action.position);
  if (!tile) return reject('no-tile', `no tile at ${formatPosition(action.position)}`);
  if (tile.player === unit.player) return reject('already-owned', `tile at ${formatPosition(tile)} already belongs to player ${unit.player}`);
  if (!rules.getTerrainUnitProperties(tile.tileType, unit.unitType)?.canCapture) {
    return reject('cannot-capture', `${definition.name} cannot capture ${rules.getTerrainData(tile.tileType).name}`);
  }
  if (unit.captureStartedTurn > 0) {
    return reject('already-capturing', `unit has been capturing since turn ${unit.captureStartedTurn}`);
  }

  const previousUnit = cloneUnit(unit);
  const updated = world.updateUnit(unit, (draft) => {
    draft.captureStartedTurn = game.turnCounter;
    advanceProgression(draft, definition, 'capture', step);
    draft.lastActedTurn = game.turnCounter;
  });

  changes.push({
    kind: 'capture:started',
    previousUnit,
    updatedUnit: cloneUnit(updated),
    tile: toCoordinate(tile),
    tileType: tile.tileType,
    currentOwner: tile.player
  });
  log(game, { tag: 'game:capture', player: unit.player, tile: coordinateKey(tile), currentOwner: tile.player });
  return { success: true, changes };
}

function applyHeal(game: Game, action: ActionOf<'heal'>): ActionResult {
  const active = activeUnitAt(game, action.position);
  if (isRejection(active)) return active;
  const { unit, changes } = active;

  if (unit.lastActedTurn >= game.turnCounter) {
    return reject('already-acted', `unit at ${formatPosition(unit)} already acted this turn`);
  }
  const definition = game.rules.getUnitData(unit.unitType);
  if (unit.availableHealth >= definition.health) {
    return reject('full-health', `unit at ${formatPosition(unit)} is at full health`);
  }
  const requested = action.amount !== undefined && action.amount > 0 ? action.amount : undefined;
  const amount = requested ?? calculateHealAmount(progressionContext(game), unit, definition);
  if (amount <= 0) return reject('cannot-heal', `unit at ${formatPosition(unit)} cannot heal here`);

  const previousUnit = cloneUnit(unit);
  const updated = game.world.updateUnit(unit, (draft) => {
    draft.availableHealth = Math.min(definition.health, draft.availableHealth + amount);
    draft.lastActedTurn = game.turnCounter;
    completeCurrentStep(draft);
  });

  changes.push({
    kind: 'unit:healed',
    previousUnit,
    updatedUnit: cloneUnit(updated),
    healAmount: updated.availableHealth - previousUnit.availableHealth
  });
  return { success: true, changes };
}

function applyEndTurn(game: Game): ActionResult {
  const changes: WorldChange[] = [];
  const previousPlayer = game.currentPlayer;
  const previousTurn = game.turnCounter;

  const income = calculatePlayerIncome(game.world, previousPlayer, game.config.incomeConfig);
  if (income > 0) {
    const previousCoins = game.coinsOf(previousPlayer);
    game.setCoins(previousPlayer, previousCoins + income);
    changes.push({
      kind: 'coins:changed',
      playerId: previousPlayer,
      previousCoins,
      newCoins: previousCoins + income,
      reason: 'income'
    });
  }

  const players = game.playerIds;
  const nextIndex = (players.indexOf(previousPlayer) + 1) % players.length;
  const newPlayer = players[nextIndex];
  game.currentPlayer = newPlayer;
  if (nextIndex === 0) game.turnCounter++;

  const ctx = progressionContext(game);
  const resetUnits: Unit[] = [];
  for (const unit of game.world.playerUnits(newPlayer)) {
    const refreshed = topUpUnitIfNeeded(ctx, unit);
    changes.push(...refreshed.changes);
    if (refreshed.toppedUp) resetUnits.push(cloneUnit(refreshed.unit));
  }

  const survivors = players.filter((player) => game.world.playerUnits(player).length > 0);
  const winner = survivors.length === 1 ? survivors[0] : undefined;
  if (winner !== undefined) {
    game.finished = true;
    game.winningPlayer = winner;
  }

  changes.push({
    kind: 'player:changed',
    previousPlayer,
    newPlayer,
    previousTurn,
    newTurn: game.turnCounter,
    resetUnits,
    ...(winner !== undefined ? { winner } : {})
  });

  log(game, { tag: 'game:turn', previousPlayer, newPlayer, turn: game.turnCounter, income });
  if (winner !== undefined) log(game, { tag: 'game:victory', winner, turn: game.turnCounter });
  return { success: true, changes };
}

function applyAction(game: Game, action: GameAction): ActionResult {
  if (game.finished) return reject('game-finished', `game is over, player ${game.winningPlayer} won`);

  switch (action.kind) {
    case 'move':
      return applyMove(game, action);
    case 'attack':
      return applyAttack(game, action);
    case 'build':
      return applyBuild(game, action);
    case 'capture':
      return applyCapture(game, action);
    case 'heal':
      return applyHeal(game, action);
    case 'endTurn':
      return applyEndTurn(game);
    default: {
      const unreachable: never = action;
      throw new Error(`unhandled action ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Validates and applies one action. A rejection leaves the world, the scalars and the
 * random sequence exactly as they were.
 */
export function processMove(game: Game, action: GameAction): ActionResult {
  const checkpoint = game.checkpoint();
  game.world.push();

  let result: ActionResult;
  try {
    result = applyAction(game, action);
  } catch (error) {
    game.world.pop();
    game.restore(checkpoint);
    throw error;
  }

  if (!result.success) {
    game.world.pop();
    game.restore(checkpoint);
    log(game, { tag: 'game:rejected', kind: action.kind, code: result.code, error: result.error });
    return result;
  }

  game.world.merge();
  log(game, { tag: 'game:move', kind: action.kind, player: checkpoint.currentPlayer, changes: result.changes.length });
  return result;
}

interface TransactionOutcome {
  result: BatchResult;
  checkpoint: GameCheckpoint;
  finalState: GameCheckpoint;
  // merged world as evaluated, captured before the layer is dropped; only set on success
  finalWorld: WorldData | undefined;
  logEntries: GameLogEntry[];
}

/**
 * Runs `actions` on a transaction layer. The layer and the scalars are always rolled back;
 * the random sequence stays advanced unless something threw.
 */
function runOnTransaction(game: Game, actions: GameAction[], firstSequenceNum: number): TransactionOutcome {
  const checkpoint = game.checkpoint();
  const logEntries: GameLogEntry[] = [];
  pendingLogs.set(game, logEntries);
  game.world.push();
  const moves: GameMove[] = [];

  try {
    for (const [index, action] of actions.entries()) {
      const player = game.currentPlayer;
      const outcome = processMove(game, action);
      if (!outcome.success) {
        return {
          result: { success: false, code: outcome.code, error: outcome.error, moveIndex: index },
          checkpoint,
          finalState: game.checkpoint(),
          finalWorld: undefined,
          logEntries
        };
      }
      moves.push({
        sequenceNum: firstSequenceNum + index,
        player,
        action,
        changes: outcome.changes,
        ...(outcome.reconstructedPath ? { reconstructedPath: outcome.reconstructedPath } : {})
      });
    }
    return {
      result: { success: true, moves },
      checkpoint,
      finalState: game.checkpoint(),
      finalWorld: game.world.toData(),
      logEntries
    };
  } catch (error) {
    game.restore(checkpoint);
    throw error;
  } finally {
    pendingLogs.delete(game);
    game.world.pop();
    game.restore(checkpoint, { keepRng: true });
  }
}

function sameScalars(a: GameCheckpoint, b: GameCheckpoint): boolean {
  return (
    a.currentPlayer === b.currentPlayer &&
    a.turnCounter === b.turnCounter &&
    a.finished === b.finished &&
    a.winningPlayer === b.winningPlayer &&
    JSON.stringify(a.playerStates) === JSON.stringify(b.playerStates)
  );
}

/**
 * All-or-nothing batch. Moves are evaluated on a transaction layer; when every one of them
 * is accepted the layer is dropped and the recorded changes are replayed onto the base.
 * The replay must reproduce the evaluated world and scalars, or nothing is committed.
 */
export function processMoves(game: Game, actions: GameAction[], firstSequenceNum = 1): BatchResult {
  if (actions.length === 0) return { success: false, code: 'empty-batch', error: 'no moves to process', moveIndex: 0 };

  const { result, checkpoint, finalState, finalWorld, logEntries } = runOnTransaction(game, actions, firstSequenceNum);
  if (!result.success) {
    game.restore(checkpoint);
    flushLogs(game, logEntries.filter((entry) => entry.tag === 'game:rejected'));
    return result;
  }

  game.world.push();
  try {
    applyChanges(game, result.moves.flatMap((move) => move.changes));
    if (!sameScalars(game.checkpoint(), finalState)) {
      throw new ReplayDivergenceError('replaying the committed changes did not reproduce the evaluated scalars');
    }
    if (!isDeepStrictEqual(game.world.toData(), finalWorld)) {
      throw new ReplayDivergenceError('replaying the committed changes did not reproduce the evaluated world');
    }
  } catch (error) {
    game.world.pop();
    game.restore(checkpoint);
    throw error;
  }
  game.world.merge();
  flushLogs(game, logEntries);
  return result;
}

/** Evaluates `actions` without committing anything, random sequence included. */
export function dryRunMoves(game: Game, actions: GameAction[]): DryRunResult {
  if (actions.length === 0) return { success: false, code: 'empty-batch', error: 'no moves to process', moveIndex: 0 };

  speculative.add(game);
  try {
    const { result, checkpoint } = runOnTransaction(game, actions, 1);
    game.restore(checkpoint);
    return result;
  } finally {
    speculative.delete(game);
  }
}
