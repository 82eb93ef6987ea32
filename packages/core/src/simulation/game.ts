import type { GameConfig } from '@hexline/data';

import { createSilentLogger } from '../logging.js';
import type { Logger } from '../logging.js';
import { InvariantViolationError } from './errors.js';
import type { RulesEngine } from './rules/rules-engine.js';
import { dryRunMoves, processMove, processMoves } from './systems/move-processor.js';
import type { ActionResult, BatchResult, DryRunResult } from './systems/move-processor.js';
import type { GameAction, GameState, PlayerId, PlayerState } from './types.js';
import { DeterministicRng } from './utils/rng.js';
import { World } from './world/layered-world.js';

export interface GameOptions {
  logger?: Logger;
  // carried into log entries only
  gameId?: string;
}

/** Scalar state captured before a speculative evaluation. */
export interface GameCheckpoint {
  currentPlayer: PlayerId;
  turnCounter: number;
  playerStates: Record<number, PlayerState>;
  finished: boolean;
  winningPlayer: PlayerId;
  rngState: number;
}

function copyPlayerStates(states: Record<number, PlayerState>): Record<number, PlayerState> {
  const copy: Record<number, PlayerState> = {};
  for (const [id, state] of Object.entries(states)) copy[Number(id)] = { ...state };
  return copy;
}

/**
 * Live runtime of one game: the world, the turn scalars and the game's random sequence.
 * It is mutated only through processMove / processMoves.
 */
export class Game {
  readonly rules: RulesEngine;
  readonly config: GameConfig;
  readonly world: World;
  readonly logger: Logger;
  readonly gameId: string | undefined;

  currentPlayer: PlayerId;
  turnCounter: number;
  version: number;
  finished: boolean;
  winningPlayer: PlayerId;
  #playerStates: Record<number, PlayerState>;
  #rng: DeterministicRng;

  constructor(rules: RulesEngine, config: GameConfig, state: GameState, options: GameOptions = {}) {
    this.rules = rules;
    this.config = config;
    this.logger = options.logger ?? createSilentLogger();
    this.gameId = options.gameId;
    this.world = World.fromData(state.worldData);
    this.currentPlayer = state.currentPlayer;
    this.turnCounter = state.turnCounter;
    this.version = state.version;
    this.finished = state.finished;
    this.winningPlayer = state.winningPlayer;
    this.#playerStates = copyPlayerStates(state.playerStates);
    this.#rng = DeterministicRng.restore(state.rngState);
  }

  static fromState(rules: RulesEngine, config: GameConfig, state: GameState, options: GameOptions = {}): Game {
    return new Game(rules, config, state, options);
  }

  /** Draws from the game's sequence; every combat roll goes through here. */
  readonly random = (): number => this.#rng.nextFloat();

  get rngState(): number {
    return this.#rng.state;
  }

  get playerIds(): PlayerId[] {
    return this.config.players.map((player) => player.id);
  }

  get playerStates(): Readonly<Record<number, PlayerState>> {
    return this.#playerStates;
  }

  coinsOf(player: PlayerId): number {
    return this.#playerStates[player]?.coins ?? 0;
  }

  setCoins(player: PlayerId, coins: number): void {
    if (!this.playerIds.includes(player)) {
      throw new InvariantViolationError(`unknown player ${player}`);
    }
    this.#playerStates[player] = { ...this.#playerStates[player], coins };
  }

  checkpoint(): GameCheckpoint {
    return {
      currentPlayer: this.currentPlayer,
      turnCounter: this.turnCounter,
      playerStates: copyPlayerStates(this.#playerStates),
      finished: this.finished,
      winningPlayer: this.winningPlayer,
      rngState: this.#rng.state
    };
  }

  /** Restores the scalars of `checkpoint`, and the random sequence unless `keepRng` is set. */
  restore(checkpoint: GameCheckpoint, options: { keepRng?: boolean } = {}): void {
    this.currentPlayer = checkpoint.currentPlayer;
    this.turnCounter = checkpoint.turnCounter;
    this.#playerStates = copyPlayerStates(checkpoint.playerStates);
    this.finished = checkpoint.finished;
    this.winningPlayer = checkpoint.winningPlayer;
    if (!options.keepRng) this.#rng = DeterministicRng.restore(checkpoint.rngState);
  }

  processMove(action: GameAction): ActionResult {
    return processMove(this, action);
  }

  processMoves(actions: GameAction[], firstSequenceNum = 1): BatchResult {
    return processMoves(this, actions, firstSequenceNum);
  }

  dryRun(actions: GameAction[]): DryRunResult {
    return dryRunMoves(this, actions);
  }

  toState(): GameState {
    return {
      currentPlayer: this.currentPlayer,
      turnCounter: this.turnCounter,
      version: this.version,
      playerStates: copyPlayerStates(this.#playerStates),
      finished: this.finished,
      winningPlayer: this.winningPlayer,
      rngState: this.#rng.state,
      worldData: this.world.toData()
    };
  }
}
