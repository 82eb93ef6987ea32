import { ReplayDivergenceError } from '../errors.js';
import type { Game } from '../game.js';
import type { GameMove, HexCoordinate, WorldChange } from '../types.js';
import { coordinateKey } from '../utils/grid.js';
import { cloneUnit } from '../utils/units.js';

function requireUnit(game: Game, coordinate: HexCoordinate, change: WorldChange) {
  const unit = game.world.unitAt(coordinate);
  if (!unit) {
    throw new ReplayDivergenceError(`${change.kind}: no unit at ${coordinateKey(coordinate)}`);
  }
  return unit;
}

function requireTile(game: Game, coordinate: HexCoordinate, change: WorldChange) {
  const tile = game.world.tileAt(coordinate);
  if (!tile) {
    throw new ReplayDivergenceError(`${change.kind}: no tile at ${coordinateKey(coordinate)}`);
  }
  return tile;
}

function applyChange(game: Game, change: WorldChange): void {
  const { world } = game;

  switch (change.kind) {
    case 'unit:moved': {
      requireUnit(game, change.previousUnit, change);
      world.removeUnit(change.previousUnit);
      world.addUnit(cloneUnit(change.updatedUnit));
      return;
    }
    case 'unit:damaged':
    case 'unit:acted':
    case 'unit:healed':
    case 'capture:started': {
      requireUnit(game, change.updatedUnit, change);
      world.addUnit(cloneUnit(change.updatedUnit));
      return;
    }
    case 'unit:killed': {
      requireUnit(game, change.previousUnit, change);
      world.removeUnit(change.previousUnit);
      return;
    }
    case 'unit:built': {
      if (world.unitAt(change.tile)) {
        throw new ReplayDivergenceError(`unit:built: ${coordinateKey(change.tile)} is occupied`);
      }
      requireTile(game, change.tile, change);
      world.addUnit(cloneUnit(change.unit));
      world.updateTile(change.tile, (tile) => {
        tile.lastActedTurn = game.turnCounter;
      });
      return;
    }
    case 'coins:changed': {
      const coins = game.coinsOf(change.playerId);
      if (coins !== change.previousCoins) {
        throw new ReplayDivergenceError(
          `coins:changed: player ${change.playerId} has ${coins}, change expected ${change.previousCoins}`
        );
      }
      game.setCoins(change.playerId, change.newCoins);
      return;
    }
    case 'player:changed': {
      if (game.currentPlayer !== change.previousPlayer || game.turnCounter !== change.previousTurn) {
        throw new ReplayDivergenceError(
          `player:changed: game is at player ${game.currentPlayer} turn ${game.turnCounter}, change expected player ${change.previousPlayer} turn ${change.previousTurn}`
        );
      }
      game.currentPlayer = change.newPlayer;
      game.turnCounter = change.newTurn;
      for (const unit of change.resetUnits) {
        requireUnit(game, unit, change);
        world.addUnit(cloneUnit(unit));
      }
      if (change.winner !== undefined) {
        game.finished = true;
        game.winningPlayer = change.winner;
      }
      return;
    }
    case 'capture:completed': {
      requireUnit(game, change.unit, change);
      world.updateUnit(change.unit, (unit) => {
        unit.captureStartedTurn = 0;
      });
      return;
    }
    case 'tile:ownership-changed': {
      requireTile(game, change.tile, change);
      world.setTileOwner(change.tile, change.newOwner, change.shortcut);
      return;
    }
    default: {
      const unreachable: never = change;
      throw new ReplayDivergenceError(`unknown change ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Re-applies recorded changes without consulting the rules or the random sequence. */
export function applyChanges(game: Game, changes: readonly WorldChange[]): void {
  for (const change of changes) applyChange(game, change);
}

export function replayMoves(game: Game, moves: readonly GameMove[]): void {
  for (const move of moves) applyChanges(game, move.changes);
}
