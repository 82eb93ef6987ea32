export type PlayerId = number;

export const NEUTRAL_PLAYER: PlayerId = 0;

export interface HexCoordinate {
  q: number;
  r: number;
}

/** Road or bridge laid over a tile; it replaces the terrain for movement and combat lookups. */
export type Crossing = 'road' | 'bridge';

export interface Tile {
  q: number;
  r: number;
  tileType: number;
  player: PlayerId;
  shortcut: string;
  lastActedTurn: number;
  crossing?: Crossing;
}

export interface AttackRecord {
  q: number;
  r: number;
  isRanged: boolean;
  turnNumber: number;
}

export interface Unit {
  q: number;
  r: number;
  player: PlayerId;
  unitType: number;
  shortcut: string;
  availableHealth: number;
  distanceLeft: number;
  progressionStep: number;
  chosenAlternative: string;
  lastToppedUpTurn: number;
  lastActedTurn: number;
  captureStartedTurn: number;
  attackHistory: AttackRecord[];
}

export interface WorldData {
  tiles: Record<string, Tile>;
  units: Record<string, Unit>;
}

export interface PlayerState {
  coins: number;
}

export interface GameState {
  currentPlayer: PlayerId;
  turnCounter: number;
  version: number;
  playerStates: Record<number, PlayerState>;
  finished: boolean;
  winningPlayer: PlayerId;
  rngState: number;
  worldData: WorldData;
}

export type GameAction =
  | { kind: 'move'; from: HexCoordinate; to: HexCoordinate; preventPassThrough?: boolean }
  | { kind: 'attack'; attacker: HexCoordinate; defender: HexCoordinate }
  | { kind: 'build'; position: HexCoordinate; unitType: number }
  | { kind: 'capture'; position: HexCoordinate }
  | { kind: 'heal'; position: HexCoordinate; amount?: number }
  | { kind: 'endTurn' };

export type GameActionKind = GameAction['kind'];

export type WorldChange =
  | { kind: 'unit:moved'; previousUnit: Unit; updatedUnit: Unit }
  | { kind: 'unit:damaged'; previousUnit: Unit; updatedUnit: Unit; damage: number }
  // progression spent in place, e.g. an attacker that took no counter damage
  | { kind: 'unit:acted'; previousUnit: Unit; updatedUnit: Unit }
  | { kind: 'unit:killed'; previousUnit: Unit }
  | { kind: 'unit:built'; unit: Unit; tile: HexCoordinate; coinsCost: number; playerCoins: number }
  | { kind: 'unit:healed'; previousUnit: Unit; updatedUnit: Unit; healAmount: number }
  | {
      kind: 'coins:changed';
      playerId: PlayerId;
      previousCoins: number;
      newCoins: number;
      reason: 'build' | 'income';
    }
  | {
      kind: 'player:changed';
      previousPlayer: PlayerId;
      newPlayer: PlayerId;
      previousTurn: number;
      newTurn: number;
      resetUnits: Unit[];
      winner?: PlayerId;
    }
  | {
      kind: 'capture:started';
      previousUnit: Unit;
      updatedUnit: Unit;
      tile: HexCoordinate;
      tileType: number;
      currentOwner: PlayerId;
    }
  | { kind: 'capture:completed'; unit: HexCoordinate; player: PlayerId; startedTurn: number }
  | {
      kind: 'tile:ownership-changed';
      tile: HexCoordinate;
      previousOwner: PlayerId;
      newOwner: PlayerId;
      // label under the new owner, '' when it has none
      shortcut: string;
    };

export type WorldChangeKind = WorldChange['kind'];

export interface PathEdge {
  from: HexCoordinate;
  to: HexCoordinate;
  movementCost: number;
  totalCost: number;
  terrainName: string;
  explanation: string;
  isOccupied: boolean;
}

export interface GameMove {
  sequenceNum: number;
  player: PlayerId;
  action: GameAction;
  changes: WorldChange[];
  reconstructedPath?: PathEdge[];
}

export interface MoveGroup {
  id: string;
  startedAt: string;
  endedAt: string;
  moves: GameMove[];
}
