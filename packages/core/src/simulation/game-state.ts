import type { GameConfig } from '@hexline/data';

import { InvariantViolationError } from './errors.js';
import type { RulesEngine } from './rules/rules-engine.js';
import type { Crossing, GameState, HexCoordinate, PlayerId, PlayerState } from './types.js';
import { coordinateKey } from './utils/grid.js';
import { DeterministicRng } from './utils/rng.js';
import { createTile, createUnit } from './utils/units.js';
import { World } from './world/layered-world.js';

export interface TileSpawn extends HexCoordinate {
  tileType: number;
  player?: PlayerId;
  crossing?: Crossing;
}

export interface UnitSpawn extends HexCoordinate {
  player: PlayerId;
  unitType: number;
}

export interface CreateGameStateOptions {
  rules: RulesEngine;
  config: GameConfig;
  tiles: TileSpawn[];
  units?: UnitSpawn[];
}

/**
 * Builds the turn-one state of a new game: full-health units, starting coins for every
 * player and a random sequence seeded from the config.
 */
export function createInitialGameState(options: CreateGameStateOptions): GameState {
  const { rules, config, tiles, units = [] } = options;
  const playerIds = new Set(config.players.map((player) => player.id));
  const world = new World();

  for (const spawn of tiles) {
    rules.getTerrainData(spawn.tileType);
    const owner = spawn.player ?? 0;
    if (owner !== 0 && !playerIds.has(owner)) {
      throw new InvariantViolationError(`tile ${coordinateKey(spawn)} is owned by unknown player ${owner}`);
    }
    const tile = createTile({ q: spawn.q, r: spawn.r, tileType: spawn.tileType, player: owner, crossing: spawn.crossing });
    if (world.addTile(tile)) {
      throw new InvariantViolationError(`duplicate tile at ${coordinateKey(spawn)}`);
    }
  }

  for (const spawn of units) {
    const key = coordinateKey(spawn);
    if (!world.tileAt(spawn)) {
      throw new InvariantViolationError(`unit spawn off the map at ${key}`);
    }
    if (!playerIds.has(spawn.player)) {
      throw new InvariantViolationError(`unit at ${key} belongs to unknown player ${spawn.player}`);
    }
    const definition = rules.getUnitData(spawn.unitType);
    const previous = world.addUnit(
      createUnit({ q: spawn.q, r: spawn.r, player: spawn.player, unitType: spawn.unitType, availableHealth: definition.health })
    );
    if (previous) {
      throw new InvariantViolationError(`spawn collision: multiple units assigned to tile ${key}`);
    }
  }

  const playerStates: Record<number, PlayerState> = {};
  for (const player of config.players) {
    playerStates[player.id] = { coins: config.startingCoins };
  }

  return {
    currentPlayer: config.players[0]?.id ?? 1,
    turnCounter: 1,
    version: 0,
    playerStates,
    finished: false,
    winningPlayer: 0,
    rngState: new DeterministicRng(config.seed).state,
    worldData: world.toData()
  };
}
