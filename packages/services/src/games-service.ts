import {
  Game,
  GameHistory,
  GameNotFoundError,
  MoveRejectedError,
  VersionMismatchError,
  createInitialGameState,
  createSilentLogger,
  getOptionsAt,
  logGame,
  predictAttack
} from '@hexline/core';
import type {
  AttackPrediction,
  GameAction,
  GameMove,
  HexCoordinate,
  Logger,
  MoveGroup,
  PlayerId,
  PositionOptions,
  RulesEngine,
  TileSpawn,
  UnitSpawn
} from '@hexline/core';
import { parseGameConfig } from '@hexline/data';
import type { GameConfigInput } from '@hexline/data';
import { nanoid } from 'nanoid';

import type { GameSnapshot, GameStore } from './game-store.js';
import { InMemoryGameStore } from './game-store.js';

export interface GamesServiceOptions {
  rules: RulesEngine;
  store?: GameStore;
  logger?: Logger;
  // used when a new game's config names no seed
  defaultSeed?: number;
}

export interface CreateGameInput {
  config?: GameConfigInput;
  tiles: TileSpawn[];
  units?: UnitSpawn[];
}

export interface GameSummary {
  id: string;
  version: number;
  currentPlayer: PlayerId;
  turnCounter: number;
  finished: boolean;
  winningPlayer: PlayerId;
}

export interface ProcessMovesOptions {
  // defaults to the version currently stored
  expectedVersion?: number;
}

export interface CommittedMoves {
  gameId: string;
  version: number;
  group: MoveGroup;
}

export class GamesService {
  readonly rules: RulesEngine;
  #store: GameStore;
  #logger: Logger;
  #defaultSeed: number | undefined;

  constructor(options: GamesServiceOptions) {
    this.rules = options.rules;
    this.#store = options.store ?? new InMemoryGameStore();
    this.#logger = options.logger ?? createSilentLogger();
    this.#defaultSeed = options.defaultSeed;
  }

  async createGame(input: CreateGameInput): Promise<GameSnapshot> {
    const seed = input.config?.seed ?? this.#defaultSeed;
    const config = parseGameConfig({ ...input.config, ...(seed !== undefined ? { seed } : {}) });
    const state = createInitialGameState({ rules: this.rules, config, tiles: input.tiles, units: input.units });
    const snapshot: GameSnapshot = { id: nanoid(), config, state, history: [] };

    await this.#store.insert(snapshot);
    logGame(this.#logger, {
      tag: 'game:created',
      gameId: snapshot.id,
      players: config.players.length,
      seed: config.seed
    });
    return snapshot;
  }

  async getGame(id: string): Promise<GameSnapshot> {
    const snapshot = await this.#store.get(id);
    if (!snapshot) throw new GameNotFoundError(id);
    return snapshot;
  }

  async listGames(): Promise<GameSummary[]> {
    const snapshots = await this.#store.list();
    return snapshots.map(({ id, state }) => ({
      id,
      version: state.version,
      currentPlayer: state.currentPlayer,
      turnCounter: state.turnCounter,
      finished: state.finished,
      winningPlayer: state.winningPlayer
    }));
  }

  async deleteGame(id: string): Promise<void> {
    if (!(await this.#store.delete(id))) throw new GameNotFoundError(id);
  }

  /**
   * Applies `moves` as one all-or-nothing batch and stores the result as a new version.
   * Throws MoveRejectedError when any move is rejected; nothing is stored then.
   */
  async processMoves(id: string, moves: GameAction[], options: ProcessMovesOptions = {}): Promise<CommittedMoves> {
    const snapshot = await this.getGame(id);
    const expectedVersion = options.expectedVersion ?? snapshot.state.version;
    if (expectedVersion !== snapshot.state.version) {
      this.#logConflict(id, expectedVersion, snapshot.state.version);
      throw new VersionMismatchError(id, expectedVersion, snapshot.state.version);
    }

    const game = this.#load(snapshot);
    const history = new GameHistory(snapshot.history);
    const startedAt = new Date().toISOString();
    const result = game.processMoves(moves, history.nextSequenceNum);
    if (!result.success) {
      throw new MoveRejectedError(result.code, result.error, result.moveIndex);
    }

    const group: MoveGroup = { id: nanoid(), startedAt, endedAt: new Date().toISOString(), moves: result.moves };
    history.append(group);

    try {
      const version = await this.#store.save(id, { ...snapshot, state: game.toState(), history: history.toJSON() }, expectedVersion);
      return { gameId: id, version, group };
    } catch (error) {
      if (error instanceof VersionMismatchError) this.#logConflict(id, error.expected, error.actual);
      throw error;
    }
  }

  /** Evaluates `moves` against the stored game without saving anything. */
  async simulateMoves(id: string, moves: GameAction[]): Promise<GameMove[]> {
    const snapshot = await this.getGame(id);
    const game = this.#load(snapshot);
    const result = game.dryRun(moves);
    if (!result.success) {
      throw new MoveRejectedError(result.code, result.error, result.moveIndex);
    }
    return result.moves;
  }

  async getOptionsAt(id: string, coordinate: HexCoordinate): Promise<PositionOptions> {
    const snapshot = await this.getGame(id);
    return getOptionsAt(this.#load(snapshot), coordinate);
  }

  /** Damage preview for one attack; the stored game and its random sequence are untouched. */
  async predictAttack(
    id: string,
    attacker: HexCoordinate,
    defender: HexCoordinate
  ): Promise<AttackPrediction | undefined> {
    const snapshot = await this.getGame(id);
    return predictAttack(this.#load(snapshot), attacker, defender);
  }

  #load(snapshot: GameSnapshot): Game {
    return Game.fromState(this.rules, snapshot.config, snapshot.state, {
      logger: this.#logger,
      gameId: snapshot.id
    });
  }

  #logConflict(gameId: string, expected: number, actual: number) {
    logGame(this.#logger, { tag: 'game:conflict', gameId, expected, actual });
  }
}
