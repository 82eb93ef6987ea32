import type { Crossing, Tile, Unit } from '../types.js';

export function cloneUnit(unit: Unit): Unit {
  return {
    ...unit,
    attackHistory: unit.attackHistory.map((record) => ({ ...record }))
  };
}

export function cloneTile(tile: Tile): Tile {
  return { ...tile };
}

export interface NewUnitInput {
  q: number;
  r: number;
  player: number;
  unitType: number;
  availableHealth: number;
  shortcut?: string;
  distanceLeft?: number;
  progressionStep?: number;
  lastToppedUpTurn?: number;
  lastActedTurn?: number;
}

export function createUnit(input: NewUnitInput): Unit {
  return {
    q: input.q,
    r: input.r,
    player: input.player,
    unitType: input.unitType,
    shortcut: input.shortcut ?? '',
    availableHealth: input.availableHealth,
    distanceLeft: input.distanceLeft ?? 0,
    progressionStep: input.progressionStep ?? 0,
    chosenAlternative: '',
    lastToppedUpTurn: input.lastToppedUpTurn ?? 0,
    lastActedTurn: input.lastActedTurn ?? 0,
    captureStartedTurn: 0,
    attackHistory: []
  };
}

export interface NewTileInput {
  q: number;
  r: number;
  tileType: number;
  player?: number;
  shortcut?: string;
  crossing?: Crossing;
}

export function createTile(input: NewTileInput): Tile {
  return {
    q: input.q,
    r: input.r,
    tileType: input.tileType,
    player: input.player ?? 0,
    shortcut: input.shortcut ?? '',
    lastActedTurn: 0,
    ...(input.crossing ? { crossing: input.crossing } : {})
  };
}
