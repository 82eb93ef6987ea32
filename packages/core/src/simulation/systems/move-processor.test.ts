import { TileType } from '@hexline/data';
import { pino } from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { ReplayDivergenceError } from '../errors.js';
import {
  ARTILLERY,
  FOREST,
  HELICOPTER,
  SOLDIER,
  SPEEDBOAT,
  STRIKER,
  createTestGame,
  gridTiles,
  withTiles
} from '../testing/fixtures.js';
import type { GameAction } from '../types.js';

function captureLogs() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => void lines.push(JSON.parse(line)) });
  return { logger, lines };
}

const soldiers = [
  { q: 0, r: 0, player: 1, unitType: SOLDIER },
  { q: 4, r: 4, player: 2, unitType: SOLDIER }
];

describe('move', () => {
  it('tops the unit up, moves it and spends the path cost', () => {
    const game = createTestGame({ units: soldiers });

    const result = game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 2, r: 0 } });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.reconstructedPath?.map((edge) => edge.to)).toEqual([
      { q: 1, r: 0 },
      { q: 2, r: 0 }
    ]);
    expect(result.changes).toHaveLength(1);
    expect(result.changes[0]).toMatchObject({
      kind: 'unit:moved',
      previousUnit: { q: 0, r: 0, distanceLeft: 3 },
      updatedUnit: { q: 2, r: 0, distanceLeft: 1, progressionStep: 0, lastActedTurn: 1, lastToppedUpTurn: 1 }
    });
    expect(game.world.unitAt({ q: 0, r: 0 })).toBeUndefined();
    expect(game.world.unitAt({ q: 2, r: 0 })?.distanceLeft).toBe(1);
    expect(game.world.numUnits()).toBe(2);
  });

  it('closes the move slot once the budget is spent', () => {
    const game = createTestGame({ units: soldiers });

    game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 3, r: 0 } });
    const again = game.processMove({ kind: 'move', from: { q: 3, r: 0 }, to: { q: 3, r: 1 } });

    expect(again).toMatchObject({ success: false, code: 'slot-closed' });
    expect(game.world.unitAt({ q: 3, r: 0 })?.progressionStep).toBe(1);
  });

  it('rejects an unreachable destination without touching the state', () => {
    const game = createTestGame({ units: soldiers });
    const before = game.toState();

    const result = game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 4, r: 0 } });

    expect(result).toMatchObject({ success: false, code: 'unreachable' });
    expect(game.toState()).toEqual(before);
  });

  it('rejects moving the other player unit', () => {
    const game = createTestGame({ units: soldiers });
    expect(game.processMove({ kind: 'move', from: { q: 4, r: 4 }, to: { q: 3, r: 4 } })).toMatchObject({
      success: false,
      code: 'not-your-turn'
    });
  });

  it('rejects an empty origin and an occupied destination', () => {
    const game = createTestGame({ units: [...soldiers, { q: 1, r: 0, player: 1, unitType: STRIKER }] });

    expect(game.processMove({ kind: 'move', from: { q: 2, r: 2 }, to: { q: 2, r: 3 } })).toMatchObject({ code: 'no-unit' });
    expect(game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 1, r: 0 } })).toMatchObject({ code: 'occupied' });
  });
});

describe('attack', () => {
  const adjacent = [
    { q: 0, r: 0, player: 1, unitType: SOLDIER },
    { q: 1, r: 0, player: 2, unitType: SOLDIER }
  ];

  it('emits the defender change first and records the attack on the defender', () => {
    const game = createTestGame({ units: adjacent });

    const result = game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 1, r: 0 } });

    expect(result.success).toBe(true);
    if (!result.success) return;
    const [defenderChange, attackerChange] = result.changes;
    expect(defenderChange).toMatchObject({
      kind: 'unit:damaged',
      previousUnit: { q: 1, r: 0, availableHealth: 10 },
      updatedUnit: { q: 1, r: 0, attackHistory: [{ q: 0, r: 0, isRanged: false, turnNumber: 1 }] }
    });
    expect(['unit:damaged', 'unit:acted']).toContain(attackerChange.kind);
    expect(attackerChange).toMatchObject({ updatedUnit: { q: 0, r: 0, progressionStep: 2, distanceLeft: 0 } });
  });

  it('records an attacker out of counter range as having acted in place', () => {
    const game = createTestGame({
      units: [
        { q: 0, r: 0, player: 1, unitType: ARTILLERY },
        { q: 2, r: 0, player: 2, unitType: STRIKER }
      ]
    });

    const result = game.processMoves([{ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 2, r: 0 } }]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    const changes = result.moves[0].changes;
    expect(changes[1]).toMatchObject({
      kind: 'unit:acted',
      previousUnit: { q: 0, r: 0, lastActedTurn: 0 },
      updatedUnit: { q: 0, r: 0, lastActedTurn: 1 }
    });
    expect(changes.map((change) => change.kind)).not.toContain('unit:moved');
    expect(game.world.unitAt({ q: 0, r: 0 })?.lastActedTurn).toBe(1);
  });

  it('closes every slot after attacking from the move step', () => {
    const game = createTestGame({ units: adjacent });

    game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 1, r: 0 } });

    expect(game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 1, r: 0 } })).toMatchObject({
      code: 'slot-closed'
    });
    expect(game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 0, r: 1 } })).toMatchObject({
      code: 'slot-closed'
    });
  });

  it('rejects friendly, unreachable and unsupported targets', () => {
    const game = createTestGame({
      units: [
        ...adjacent,
        { q: 0, r: 1, player: 1, unitType: STRIKER },
        { q: 3, r: 0, player: 2, unitType: SOLDIER },
        { q: 0, r: 2, player: 2, unitType: HELICOPTER }
      ]
    });
    const before = game.toState();

    expect(game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 0, r: 1 } })).toMatchObject({
      code: 'cannot-attack'
    });
    expect(game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 3, r: 0 } })).toMatchObject({
      code: 'out-of-range'
    });
    expect(game.processMove({ kind: 'attack', attacker: { q: 0, r: 1 }, defender: { q: 0, r: 2 } })).toMatchObject({
      code: 'cannot-attack'
    });
    expect(game.processMove({ kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 2, r: 2 } })).toMatchObject({
      code: 'no-unit'
    });
    expect(game.toState()).toEqual(before);
  });

  it('produces identical results for identically seeded games', () => {
    const moves: GameAction[] = [
      { kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 1, r: 0 } },
      { kind: 'endTurn' },
      { kind: 'attack', attacker: { q: 1, r: 0 }, defender: { q: 0, r: 0 } }
    ];
    const play = () => {
      const game = createTestGame({
        units: [...adjacent, { q: 4, r: 4, player: 1, unitType: STRIKER }, { q: 4, r: 3, player: 2, unitType: STRIKER }],
        config: { seed: 77 }
      });
      const results = moves.map((move) => game.processMove(move));
      return { results, state: game.toState() };
    };

    const first = play();
    const second = play();

    expect(second.results).toEqual(first.results);
    expect(second.state).toEqual(first.state);
  });
});

describe('build', () => {
  const baseTiles = withTiles(gridTiles(5, 5), [
    { q: 0, r: 0, tileType: TileType.LandBase, player: 1 },
    { q: 4, r: 0, tileType: TileType.LandBase },
    { q: 2, r: 2, tileType: TileType.NavalBase, player: 1 }
  ]);
  const units = [
    { q: 1, r: 1, player: 1, unitType: SOLDIER },
    { q: 4, r: 4, player: 2, unitType: SOLDIER }
  ];

  it('creates an exhausted unit and charges the player', () => {
    const game = createTestGame({ tiles: baseTiles, units });

    const result = game.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SOLDIER });

    expect(result).toEqual({
      success: true,
      changes: [
        {
          kind: 'unit:built',
          unit: {
            q: 0,
            r: 0,
            player: 1,
            unitType: SOLDIER,
            shortcut: 'A2',
            availableHealth: 10,
            distanceLeft: 0,
            progressionStep: 1,
            chosenAlternative: '',
            lastToppedUpTurn: 1,
            lastActedTurn: 1,
            captureStartedTurn: 0,
            attackHistory: []
          },
          tile: { q: 0, r: 0 },
          coinsCost: 75,
          playerCoins: 225
        },
        { kind: 'coins:changed', playerId: 1, previousCoins: 300, newCoins: 225, reason: 'build' }
      ]
    });
    expect(game.coinsOf(1)).toBe(225);
    expect(game.world.tileAt({ q: 0, r: 0 })?.lastActedTurn).toBe(1);
  });

  it('allows one build per tile per turn', () => {
    const game = createTestGame({ tiles: baseTiles, units });
    game.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SOLDIER });

    expect(game.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SOLDIER })).toMatchObject({
      code: 'already-built'
    });
  });

  it('checks ownership, terrain, restrictions and coins', () => {
    const restricted = createTestGame({ tiles: baseTiles, units, config: { allowedUnits: [STRIKER] } });
    const poor = createTestGame({ tiles: baseTiles, units, config: { startingCoins: 50 } });
    const game = createTestGame({ tiles: baseTiles, units });

    expect(game.processMove({ kind: 'build', position: { q: 4, r: 0 }, unitType: SOLDIER })).toMatchObject({
      code: 'not-owner'
    });
    expect(game.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SPEEDBOAT })).toMatchObject({
      code: 'not-buildable'
    });
    expect(game.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: 99 })).toMatchObject({
      code: 'not-buildable'
    });
    expect(game.processMove({ kind: 'build', position: { q: 9, r: 9 }, unitType: SOLDIER })).toMatchObject({
      code: 'no-tile'
    });
    expect(restricted.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SOLDIER })).toMatchObject({
      code: 'unit-not-allowed'
    });
    expect(poor.processMove({ kind: 'build', position: { q: 0, r: 0 }, unitType: SOLDIER })).toMatchObject({
      code: 'insufficient-coins'
    });
    expect(game.coinsOf(1)).toBe(300);
  });

  it('rejects building under a unit', () => {
    const game = createTestGame({ tiles: baseTiles, units: [...units, { q: 2, r: 2, player: 1, unitType: SOLDIER }] });
    expect(game.processMove({ kind: 'build', position: { q: 2, r: 2 }, unitType: SPEEDBOAT })).toMatchObject({
      code: 'occupied'
    });
  });
});

describe('capture', () => {
  const captureTiles = withTiles(gridTiles(5, 5), [
    { q: 1, r: 0, tileType: TileType.LandBase },
    { q: 0, r: 4, tileType: TileType.LandBase, player: 1 }
  ]);

  it('flips ownership at the capturing unit next refresh', () => {
    const game = createTestGame({ tiles: captureTiles, units: soldiers });

    game.processMove({ kind: 'move', from: { q: 0, r: 0 }, to: { q: 1, r: 0 } });
    const started = game.processMove({ kind: 'capture', position: { q: 1, r: 0 } });

    expect(started).toMatchObject({
      success: true,
      changes: [
        {
          kind: 'capture:started',
          updatedUnit: { q: 1, r: 0, captureStartedTurn: 1, progressionStep: 2 },
          tile: { q: 1, r: 0 },
          tileType: TileType.LandBase,
          currentOwner: 0
        }
      ]
    });
    expect(game.world.tileAt({ q: 1, r: 0 })?.player).toBe(0);

    game.processMove({ kind: 'endTurn' });
    expect(game.world.tileAt({ q: 1, r: 0 })?.player).toBe(0);

    const backToOne = game.processMove({ kind: 'endTurn' });
    expect(backToOne.success).toBe(true);
    if (!backToOne.success) return;
    expect(backToOne.changes.map((change) => change.kind)).toEqual([
      'capture:completed',
      'tile:ownership-changed',
      'player:changed'
    ]);
    expect(backToOne.changes[1]).toEqual({
      kind: 'tile:ownership-changed',
      tile: { q: 1, r: 0 },
      previousOwner: 0,
      newOwner: 1,
      shortcut: 'A2'
    });
    expect(game.world.tileAt({ q: 1, r: 0 })).toMatchObject({ player: 1, shortcut: 'A2' });
    expect(game.world.tileByShortcut('A2')).toMatchObject({ q: 1, r: 0 });
    expect(game.world.unitAt({ q: 1, r: 0 })?.captureStartedTurn).toBe(0);
    expect(game.turnCounter).toBe(2);
  });

  it('rejects capturing an owned tile without any state change', () => {
    const game = createTestGame({ tiles: captureTiles, units: [{ q: 0, r: 4, player: 1, unitType: SOLDIER }, soldiers[1]] });
    const before = game.toState();

    expect(game.processMove({ kind: 'capture', position: { q: 0, r: 4 } })).toMatchObject({ code: 'already-owned' });
    expect(game.toState()).toEqual(before);
  });

  it('rejects an ineligible unit or terrain without any state change', () => {
    const game = createTestGame({ tiles: captureTiles, units: soldiers });
    const before = game.toState();

    expect(game.processMove({ kind: 'capture', position: { q: 0, r: 0 } })).toMatchObject({ code: 'cannot-capture' });
    expect(game.toState()).toEqual(before);
  });

  it('rejects a unit that is already capturing', () => {
    const game = createTestGame({ tiles: captureTiles, units: [{ q: 1, r: 0, player: 1, unitType: SOLDIER }, soldiers[1]] });
    game.world.updateUnit({ q: 1, r: 0 }, (unit) => {
      unit.captureStartedTurn = 1;
      unit.lastToppedUpTurn = 1;
      unit.distanceLeft = 3;
    });
    const before = game.toState();

    expect(game.processMove({ kind: 'capture', position: { q: 1, r: 0 } })).toMatchObject({ code: 'already-capturing' });
    expect(game.toState()).toEqual(before);
  });
});

describe('heal', () => {
  function woundedGame(tileType: number = TileType.Grass) {
    const game = createTestGame({
      tiles: withTiles(gridTiles(5, 5), [{ q: 0, r: 0, tileType }]),
      units: soldiers
    });
    game.world.updateUnit({ q: 0, r: 0 }, (unit) => {
      unit.availableHealth = 5;
    });
    return game;
  }

  it('heals by the terrain amount after the refresh heal', () => {
    const game = woundedGame();

    const result = game.processMove({ kind: 'heal', position: { q: 0, r: 0 } });

    expect(result).toMatchObject({
      success: true,
      changes: [
        {
          kind: 'unit:healed',
          previousUnit: { availableHealth: 6 },
          updatedUnit: { availableHealth: 7, lastActedTurn: 1, progressionStep: 1 },
          healAmount: 1
        }
      ]
    });
    expect(game.processMove({ kind: 'heal', position: { q: 0, r: 0 } })).toMatchObject({ code: 'already-acted' });
  });

  it('uses an explicit amount capped at maximum health', () => {
    const game = woundedGame();
    const result = game.processMove({ kind: 'heal', position: { q: 0, r: 0 }, amount: 10 });
    expect(result).toMatchObject({ success: true, changes: [{ updatedUnit: { availableHealth: 10 }, healAmount: 4 }] });
  });

  it('rejects healing without a terrain bonus or at full health', () => {
    expect(woundedGame(FOREST).processMove({ kind: 'heal', position: { q: 0, r: 0 } })).toMatchObject({
      code: 'cannot-heal'
    });
    const healthy = createTestGame({ units: soldiers });
    expect(healthy.processMove({ kind: 'heal', position: { q: 0, r: 0 } })).toMatchObject({ code: 'full-health' });
  });
});

describe('endTurn', () => {
  it('pays income to the ending player', () => {
    const game = createTestGame({
      tiles: withTiles(gridTiles(5, 5), [
        { q: 0, r: 0, tileType: TileType.LandBase, player: 1 },
        { q: 1, r: 0, tileType: TileType.NavalBase, player: 1 },
        { q: 2, r: 0, tileType: TileType.Airport, player: 1 }
      ]),
      units: soldiers,
      config: {
        incomeConfig: { landbaseIncome: 200, navalbaseIncome: 300, airportbaseIncome: 400, gameIncome: 50 }
      }
    });

    const result = game.processMove({ kind: 'endTurn' });

    expect(result).toMatchObject({
      success: true,
      changes: [
        { kind: 'coins:changed', playerId: 1, previousCoins: 300, newCoins: 1250, reason: 'income' },
        { kind: 'player:changed', previousPlayer: 1, newPlayer: 2, previousTurn: 1, newTurn: 1 }
      ]
    });
    expect(game.coinsOf(1)).toBe(1250);
    expect(game.currentPlayer).toBe(2);
  });

  it('refreshes the incoming units and advances the turn on wrap', () => {
    const game = createTestGame({ units: soldiers });

    const toTwo = game.processMove({ kind: 'endTurn' });
    const toOne = game.processMove({ kind: 'endTurn' });

    expect(toTwo).toMatchObject({
      changes: [{ kind: 'player:changed', resetUnits: [{ q: 4, r: 4, distanceLeft: 3, lastToppedUpTurn: 1 }] }]
    });
    expect(toOne).toMatchObject({
      changes: [{ kind: 'player:changed', newPlayer: 1, newTurn: 2, resetUnits: [{ q: 0, r: 0, lastToppedUpTurn: 2 }] }]
    });
    expect(game.turnCounter).toBe(2);
  });

  it('declares the last player with units the winner', () => {
    const game = createTestGame({ units: [soldiers[0]] });

    const result = game.processMove({ kind: 'endTurn' });

    expect(result).toMatchObject({ changes: [{ kind: 'player:changed', winner: 1 }] });
    expect(game.finished).toBe(true);
    expect(game.winningPlayer).toBe(1);
    expect(game.processMove({ kind: 'endTurn' })).toMatchObject({ success: false, code: 'game-finished' });
  });
});

describe('batches', () => {
  const moves: GameAction[] = [
    { kind: 'move', from: { q: 0, r: 0 }, to: { q: 0, r: 2 } },
    { kind: 'endTurn' },
    { kind: 'move', from: { q: 4, r: 4 }, to: { q: 4, r: 2 } },
    { kind: 'endTurn' }
  ];

  it('commits the same state as processing the moves one at a time', () => {
    const batched = createTestGame({ units: soldiers });
    const stepped = createTestGame({ units: soldiers });

    const result = batched.processMoves(moves, 5);
    for (const move of moves) stepped.processMove(move);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.moves.map((move) => [move.sequenceNum, move.player])).toEqual([
      [5, 1],
      [6, 1],
      [7, 2],
      [8, 2]
    ]);
    expect(batched.toState()).toEqual(stepped.toState());
    expect(batched.world.depth).toBe(0);
  });

  it('rolls back every move when one is rejected', () => {
    const game = createTestGame({ units: soldiers });
    const before = game.toState();

    const result = game.processMoves([...moves.slice(0, 2), { kind: 'move', from: { q: 0, r: 2 }, to: { q: 0, r: 3 } }]);

    expect(result).toMatchObject({ success: false, code: 'not-your-turn', moveIndex: 2 });
    expect(game.toState()).toEqual(before);
    expect(game.world.depth).toBe(0);
  });

  it('logs moves only once the batch commits', () => {
    const { logger, lines } = captureLogs();
    const game = createTestGame({ units: soldiers, logger });

    game.processMoves([...moves.slice(0, 2), { kind: 'move', from: { q: 0, r: 2 }, to: { q: 0, r: 3 } }]);
    expect(lines.map((line) => line.tag)).toEqual(['game:rejected']);

    lines.length = 0;
    game.processMoves(moves.slice(0, 2));
    expect(lines.map((line) => line.tag)).toEqual(['game:move', 'game:turn', 'game:move']);
  });

  it('commits nothing when the replayed world differs from the evaluated one', () => {
    const game = createTestGame({ units: soldiers });
    const before = game.toState();
    const toData = game.world.toData.bind(game.world);
    let calls = 0;
    const spy = vi.spyOn(game.world, 'toData').mockImplementation(() => {
      const data = toData();
      calls++;
      // second read is the replayed world
      if (calls === 2) data.units['0,2'].distanceLeft = 99;
      return data;
    });

    expect(() => game.processMoves(moves.slice(0, 1))).toThrow(ReplayDivergenceError);
    spy.mockRestore();

    expect(game.toState()).toEqual(before);
    expect(game.world.depth).toBe(0);
  });

  it('rejects an empty batch', () => {
    const game = createTestGame({ units: soldiers });
    expect(game.processMoves([])).toMatchObject({ success: false, code: 'empty-batch' });
  });
});

describe('dryRun', () => {
  const adjacent = [
    { q: 0, r: 0, player: 1, unitType: SOLDIER },
    { q: 1, r: 0, player: 2, unitType: SOLDIER }
  ];
  const attack: GameAction = { kind: 'attack', attacker: { q: 0, r: 0 }, defender: { q: 1, r: 0 } };

  it('returns the would-be changes and restores the random sequence', () => {
    const game = createTestGame({ units: adjacent });
    const before = game.toState();

    const dry = game.dryRun([attack]);
    expect(game.toState()).toEqual(before);

    const real = game.processMove(attack);
    expect(dry.success && real.success).toBe(true);
    if (!dry.success || !real.success) return;
    expect(dry.moves[0].changes).toEqual(real.changes);
  });

  it('reports the failing move', () => {
    const game = createTestGame({ units: adjacent });
    expect(game.dryRun([attack, attack])).toMatchObject({ success: false, code: 'slot-closed', moveIndex: 1 });
    expect(game.world.depth).toBe(0);
  });
});
