import { TileType, parseGameConfig } from '@hexline/data';
import { describe, expect, it } from 'vitest';

import { InvariantViolationError } from './errors.js';
import { createInitialGameState } from './game-state.js';
import { SOLDIER, STRIKER, gridTiles, testRules } from './testing/fixtures.js';
import { DeterministicRng } from './utils/rng.js';

const rules = testRules();

describe('createInitialGameState', () => {
  it('starts on turn one with full-health units and starting coins', () => {
    const config = parseGameConfig({ startingCoins: 500, seed: 9 });
    const state = createInitialGameState({
      rules,
      config,
      tiles: [...gridTiles(2, 1), { q: 0, r: 1, tileType: TileType.LandBase, player: 2 }],
      units: [
        { q: 0, r: 0, player: 1, unitType: SOLDIER },
        { q: 1, r: 0, player: 2, unitType: STRIKER }
      ]
    });

    expect(state).toMatchObject({
      currentPlayer: 1,
      turnCounter: 1,
      version: 0,
      finished: false,
      winningPlayer: 0,
      playerStates: { 1: { coins: 500 }, 2: { coins: 500 } },
      rngState: new DeterministicRng(9).state
    });
    expect(state.worldData.units['0,0']).toMatchObject({ shortcut: 'A1', availableHealth: 10, progressionStep: 0 });
    expect(state.worldData.units['1,0']).toMatchObject({ shortcut: 'B1', unitType: STRIKER });
    expect(state.worldData.tiles['0,1']).toMatchObject({ player: 2, shortcut: 'B1' });
    expect(state.worldData.tiles['0,0'].shortcut).toBe('');
  });

  it('rejects two units on one tile', () => {
    expect(() =>
      createInitialGameState({
        rules,
        config: parseGameConfig(),
        tiles: gridTiles(2, 2),
        units: [
          { q: 1, r: 1, player: 1, unitType: SOLDIER },
          { q: 1, r: 1, player: 2, unitType: SOLDIER }
        ]
      })
    ).toThrow('spawn collision: multiple units assigned to tile 1,1');
  });

  it('rejects units off the map or for unknown players', () => {
    const base = { rules, config: parseGameConfig(), tiles: gridTiles(2, 2) };

    expect(() => createInitialGameState({ ...base, units: [{ q: 5, r: 5, player: 1, unitType: SOLDIER }] })).toThrow(
      InvariantViolationError
    );
    expect(() => createInitialGameState({ ...base, units: [{ q: 0, r: 0, player: 3, unitType: SOLDIER }] })).toThrow(
      InvariantViolationError
    );
    expect(() => createInitialGameState({ ...base, units: [{ q: 0, r: 0, player: 1, unitType: 42 }] })).toThrow(
      InvariantViolationError
    );
  });

  it('rejects duplicate tiles and unknown terrain', () => {
    const config = parseGameConfig();
    expect(() => createInitialGameState({ rules, config, tiles: [...gridTiles(1, 1), ...gridTiles(1, 1)] })).toThrow(
      'duplicate tile at 0,0'
    );
    expect(() => createInitialGameState({ rules, config, tiles: [{ q: 0, r: 0, tileType: 99 }] })).toThrow(
      InvariantViolationError
    );
  });
});
