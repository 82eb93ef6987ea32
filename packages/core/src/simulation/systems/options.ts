import { calculateHitProbability, canUnitAttackTarget } from '../combat/combat-resolver.js';
import type { CombatContext } from '../combat/combat-resolver.js';
import { generateDamageDistribution } from '../combat/damage-distribution.js';
import type { DamageDistribution } from '../combat/damage-distribution.js';
import { calculateWoundBonus } from '../combat/wound-bonus.js';
import type { Game } from '../game.js';
import { computeAllPaths } from '../pathfinding/movement-planner.js';
import { resolveActionStep } from '../progression/action-progression.js';
import { calculateHealAmount, isUnitExhausted, topUpUnitIfNeeded } from '../progression/top-up.js';
import type { HexCoordinate, PathEdge, PlayerId, Tile, Unit } from '../types.js';
import { compareCoordinates, sameCoordinate } from '../utils/grid.js';
import { cloneTile, cloneUnit } from '../utils/units.js';

export interface BuildOption {
  unitType: number;
  name: string;
  coins: number;
  affordable: boolean;
}

/** Expected outcome of an attack, estimated without touching the game's random sequence. */
export interface AttackPrediction {
  attacker: HexCoordinate;
  defender: HexCoordinate;
  woundBonus: number;
  hitProbability: number;
  damage: DamageDistribution;
  // absent when the defender cannot strike back
  counterDamage?: DamageDistribution;
}

export interface UnitOptions {
  kind: 'unit';
  unit: Unit;
  movement: PathEdge[];
  attackTargets: HexCoordinate[];
  attackPredictions: AttackPrediction[];
  canCapture: boolean;
  healAmount: number;
}

export interface TileOptions {
  kind: 'tile';
  tile: Tile;
  buildOptions: BuildOption[];
}

export type PositionOptions = UnitOptions | TileOptions | { kind: 'none' };

/**
 * Runs `query` against the unit at `coordinate` as it would look after its refresh.
 * The refresh happens on a scratch layer that is always dropped.
 */
function withRefreshedUnit<T>(game: Game, coordinate: HexCoordinate, query: (unit: Unit) => T): T | undefined {
  const unit = game.world.unitAt(coordinate);
  if (!unit || unit.player !== game.currentPlayer || game.finished) return undefined;

  game.world.push();
  try {
    const { unit: refreshed } = topUpUnitIfNeeded(
      { world: game.world, rules: game.rules, turnCounter: game.turnCounter },
      coordinate
    );
    return query(refreshed);
  } finally {
    game.world.pop();
  }
}

function movementFor(game: Game, unit: Unit, preventPassThrough: boolean): PathEdge[] {
  const definition = game.rules.getUnitData(unit.unitType);
  const open =
    resolveActionStep(unit, definition, 'move') !== undefined ||
    resolveActionStep(unit, definition, 'retreat') !== undefined;
  if (!open) return [];

  const { edges } = computeAllPaths(game.world, game.rules, unit, { preventPassThrough });
  return [...edges.values()].filter((edge) => !edge.isOccupied).sort((a, b) => compareCoordinates(a.to, b.to));
}

function attackTargetsFor(game: Game, unit: Unit): HexCoordinate[] {
  const definition = game.rules.getUnitData(unit.unitType);
  if (resolveActionStep(unit, definition, 'attack') === undefined) return [];

  const targets: HexCoordinate[] = [];
  for (const target of game.world.units()) {
    if (canUnitAttackTarget(game.rules, unit, target)) targets.push({ q: target.q, r: target.r });
  }
  return targets.sort(compareCoordinates);
}

function predictionFor(game: Game, attacker: Unit, defender: Unit): AttackPrediction | undefined {
  if (!canUnitAttackTarget(game.rules, attacker, defender)) return undefined;
  const attackerTile = game.world.tileAt(attacker);
  const defenderTile = game.world.tileAt(defender);
  if (!attackerTile || !defenderTile) return undefined;

  const woundBonus = calculateWoundBonus(defender, attacker);
  const ctx: CombatContext = {
    attacker,
    attackerTile,
    attackerHealth: attacker.availableHealth,
    defender,
    defenderTile,
    woundBonus
  };
  const hitProbability = calculateHitProbability(game.rules, ctx);
  const damage = generateDamageDistribution(game.rules, ctx);
  if (hitProbability === undefined || !damage) return undefined;

  const prediction: AttackPrediction = {
    attacker: { q: attacker.q, r: attacker.r },
    defender: { q: defender.q, r: defender.r },
    woundBonus,
    hitProbability,
    damage
  };
  if (canUnitAttackTarget(game.rules, defender, attacker)) {
    const counterDamage = generateDamageDistribution(game.rules, {
      attacker: defender,
      attackerTile: defenderTile,
      attackerHealth: defender.availableHealth,
      defender: attacker,
      defenderTile: attackerTile,
      woundBonus: 0
    });
    if (counterDamage) prediction.counterDamage = counterDamage;
  }
  return prediction;
}

function attackPredictionsFor(game: Game, unit: Unit): AttackPrediction[] {
  const predictions: AttackPrediction[] = [];
  for (const target of attackTargetsFor(game, unit)) {
    const defender = game.world.unitAt(target);
    const prediction = defender && predictionFor(game, unit, defender);
    if (prediction) predictions.push(prediction);
  }
  return predictions;
}

function canCaptureHere(game: Game, unit: Unit): boolean {
  const definition = game.rules.getUnitData(unit.unitType);
  if (resolveActionStep(unit, definition, 'capture') === undefined) return false;
  if (unit.captureStartedTurn > 0) return false;

  const tile = game.world.tileAt(unit);
  if (!tile || tile.player === unit.player) return false;
  return game.rules.getTerrainUnitProperties(tile.tileType, unit.unitType)?.canCapture ?? false;
}

function healAmountFor(game: Game, unit: Unit): number {
  const definition = game.rules.getUnitData(unit.unitType);
  if (unit.lastActedTurn >= game.turnCounter || unit.availableHealth >= definition.health) return 0;
  return calculateHealAmount({ world: game.world, rules: game.rules, turnCounter: game.turnCounter }, unit, definition);
}

export function getMovementOptions(game: Game, coordinate: HexCoordinate, preventPassThrough = false): PathEdge[] {
  return withRefreshedUnit(game, coordinate, (unit) => movementFor(game, unit, preventPassThrough)) ?? [];
}

export function getAttackOptions(game: Game, coordinate: HexCoordinate): HexCoordinate[] {
  return withRefreshedUnit(game, coordinate, (unit) => attackTargetsFor(game, unit)) ?? [];
}

/**
 * Damage preview for the current player's unit at `attacker` striking `defender`, counter
 * included. Undefined when that attack is not available right now.
 */
export function predictAttack(
  game: Game,
  attacker: HexCoordinate,
  defender: HexCoordinate
): AttackPrediction | undefined {
  return withRefreshedUnit(game, attacker, (unit) => {
    if (resolveActionStep(unit, game.rules.getUnitData(unit.unitType), 'attack') === undefined) return undefined;
    const target = game.world.unitAt(defender);
    return target && predictionFor(game, unit, target);
  });
}

/** Whether the current player's unit at `attacker` could attack `defender` right now. */
export function canAttackUnit(game: Game, attacker: HexCoordinate, defender: HexCoordinate): boolean {
  return getAttackOptions(game, attacker).some((target) => sameCoordinate(target, defender));
}

function buildOptionsFor(game: Game, tile: Tile): BuildOption[] {
  if (tile.player !== game.currentPlayer || tile.lastActedTurn >= game.turnCounter) return [];

  const coins = game.coinsOf(game.currentPlayer);
  const allowed = game.config.allowedUnits;
  return game.rules
    .getTerrainData(tile.tileType)
    .buildableUnitIds.filter((unitType) => game.rules.hasUnitType(unitType))
    .filter((unitType) => !allowed || allowed.includes(unitType))
    .map((unitType) => {
      const definition = game.rules.getUnitData(unitType);
      return { unitType, name: definition.name, coins: definition.coins, affordable: definition.coins <= coins };
    });
}

export function getOptionsAt(game: Game, coordinate: HexCoordinate): PositionOptions {
  const unitOptions = withRefreshedUnit(game, coordinate, (unit): UnitOptions => ({
    kind: 'unit',
    unit: cloneUnit(unit),
    movement: movementFor(game, unit, false),
    attackTargets: attackTargetsFor(game, unit),
    attackPredictions: attackPredictionsFor(game, unit),
    canCapture: canCaptureHere(game, unit),
    healAmount: healAmountFor(game, unit)
  }));
  if (unitOptions) return unitOptions;

  const tile = game.world.tileAt(coordinate);
  if (!game.finished && tile && !game.world.unitAt(coordinate) && tile.player === game.currentPlayer) {
    return { kind: 'tile', tile: cloneTile(tile), buildOptions: buildOptionsFor(game, tile) };
  }
  return { kind: 'none' };
}

/** Units of `player` that were refreshed this turn and have spent their budget. */
export function getExhaustedUnits(game: Game, player: PlayerId = game.currentPlayer): Unit[] {
  return game.world.playerUnits(player).filter((unit) => isUnitExhausted(unit, game.turnCounter));
}
