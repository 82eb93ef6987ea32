import { GameNotFoundError, VersionMismatchError } from '@hexline/core';
import type { GameState, MoveGroup } from '@hexline/core';
import type { GameConfig } from '@hexline/data';

export interface GameSnapshot {
  id: string;
  config: GameConfig;
  state: GameState;
  history: MoveGroup[];
}

/**
 * Persistence boundary for games. Updates are optimistic: a save names the version it was
 * computed from and fails if the stored game has moved on.
 */
export interface GameStore {
  get(id: string): Promise<GameSnapshot | undefined>;
  list(): Promise<GameSnapshot[]>;
  insert(snapshot: GameSnapshot): Promise<void>;
  /** Stores `snapshot` as version `expectedVersion + 1` and returns that version. */
  save(id: string, snapshot: GameSnapshot, expectedVersion: number): Promise<number>;
  delete(id: string): Promise<boolean>;
}

export class InMemoryGameStore implements GameStore {
  #games = new Map<string, GameSnapshot>();

  async get(id: string): Promise<GameSnapshot | undefined> {
    const snapshot = this.#games.get(id);
    return snapshot ? structuredClone(snapshot) : undefined;
  }

  async list(): Promise<GameSnapshot[]> {
    return [...this.#games.values()].map((snapshot) => structuredClone(snapshot));
  }

  async insert(snapshot: GameSnapshot): Promise<void> {
    if (this.#games.has(snapshot.id)) {
      throw new VersionMismatchError(snapshot.id, snapshot.state.version, this.#games.get(snapshot.id)?.state.version ?? 0);
    }
    this.#games.set(snapshot.id, structuredClone(snapshot));
  }

  async save(id: string, snapshot: GameSnapshot, expectedVersion: number): Promise<number> {
    const stored = this.#games.get(id);
    if (!stored) throw new GameNotFoundError(id);
    if (stored.state.version !== expectedVersion) {
      throw new VersionMismatchError(id, expectedVersion, stored.state.version);
    }

    const version = expectedVersion + 1;
    const next = structuredClone(snapshot);
    next.state.version = version;
    this.#games.set(id, next);
    return version;
  }

  async delete(id: string): Promise<boolean> {
    return this.#games.delete(id);
  }
}
