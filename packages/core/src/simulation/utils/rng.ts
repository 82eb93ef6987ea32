/**
 * Seedable mulberry32 sequence. Its whole state is one uint32, so a game can persist it
 * and resume the exact same draws after a reload.
 */
export class DeterministicRng {
  #state: number;

  constructor(seedOrState: number) {
    this.#state = seedOrState >>> 0;
    // mulberry32 degenerates at 0
    if (this.#state === 0) this.#state = 0x12345678;
  }

  /** Resumes a sequence from a persisted `state`, without seed normalisation. */
  static restore(state: number): DeterministicRng {
    const rng = new DeterministicRng(1);
    rng.#state = state >>> 0;
    return rng;
  }

  get state(): number {
    return this.#state >>> 0;
  }

  /** Returns a uint32 in [0, 2^32). */
  nextUint32(): number {
    this.#state = (this.#state + 0x6d2b79f5) >>> 0;
    let t = this.#state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Returns a float in [0, 1). */
  nextFloat(): number {
    return this.nextUint32() / 4294967296;
  }
}

export const DIAGNOSTIC_SEED = 12345;
