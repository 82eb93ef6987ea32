import { TileType, loadDefaultRulesTable, parseGameConfig } from '@hexline/data';
import type { GameConfigInput } from '@hexline/data';

import type { Logger } from '../../logging.js';
import { Game } from '../game.js';
import { createInitialGameState } from '../game-state.js';
import type { TileSpawn, UnitSpawn } from '../game-state.js';
import { RulesEngine } from '../rules/rules-engine.js';
import type { Tile } from '../types.js';
import { createTile } from '../utils/units.js';
import { World } from '../world/layered-world.js';

export const SOLDIER = 1;
export const STRIKER = 2;
export const ARTILLERY = 3;
export const SPEEDBOAT = 4;
export const HELICOPTER = 5;
export const WATER = 10;
export const FOREST = 6;

export function testRules(): RulesEngine {
  return new RulesEngine(loadDefaultRulesTable());
}

/** Tiles covering q in [0, width) and r in [0, height). */
export function gridTiles(width: number, height: number, tileType: number = TileType.Grass): Tile[] {
  const tiles: Tile[] = [];
  for (let r = 0; r < height; r++) {
    for (let q = 0; q < width; q++) {
      tiles.push(createTile({ q, r, tileType }));
    }
  }
  return tiles;
}

export function worldWithTiles(tiles: Tile[]): World {
  const world = new World();
  for (const tile of tiles) world.addTile(tile);
  return world;
}

export interface TestGameInput {
  tiles?: TileSpawn[];
  units?: UnitSpawn[];
  config?: GameConfigInput;
  logger?: Logger;
}

/** A two-player game on a 5x5 grass board unless told otherwise. */
export function createTestGame(input: TestGameInput = {}): Game {
  const rules = testRules();
  const config = parseGameConfig(input.config ?? {});
  const state = createInitialGameState({
    rules,
    config,
    tiles: input.tiles ?? gridTiles(5, 5),
    units: input.units
  });
  return new Game(rules, config, state, { logger: input.logger });
}

/** Replaces the tile type (and owner) at the given coordinates. */
export function withTiles(tiles: TileSpawn[], overrides: TileSpawn[]): TileSpawn[] {
  return tiles.map((tile) => overrides.find((o) => o.q === tile.q && o.r === tile.r) ?? tile);
}
