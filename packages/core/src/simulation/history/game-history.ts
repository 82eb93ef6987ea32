import { InvariantViolationError } from '../errors.js';
import type { GameMove, MoveGroup } from '../types.js';

/** Append-only log of committed batches. Sequence numbers run 1..n across all groups. */
export class GameHistory {
  #groups: MoveGroup[] = [];
  #moveCount = 0;

  constructor(groups: MoveGroup[] = []) {
    for (const group of groups) this.#push(group);
  }

  get groups(): readonly MoveGroup[] {
    return this.#groups;
  }

  get moveCount(): number {
    return this.#moveCount;
  }

  get nextSequenceNum(): number {
    return this.#moveCount + 1;
  }

  append(group: MoveGroup): void {
    this.#push(group);
  }

  moves(): GameMove[] {
    return this.#groups.flatMap((group) => group.moves);
  }

  toJSON(): MoveGroup[] {
    return structuredClone(this.#groups);
  }

  #push(group: MoveGroup) {
    if (group.moves.length === 0) {
      throw new InvariantViolationError(`move group ${group.id} is empty`);
    }
    for (const [offset, move] of group.moves.entries()) {
      const expected = this.#moveCount + offset + 1;
      if (move.sequenceNum !== expected) {
        throw new InvariantViolationError(`move group ${group.id}: expected sequence ${expected}, got ${move.sequenceNum}`);
      }
    }
    this.#groups.push(group);
    this.#moveCount += group.moves.length;
  }
}
