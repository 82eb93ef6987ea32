export type RejectionCode =
  | 'no-unit'
  | 'no-tile'
  | 'not-your-turn'
  | 'not-owner'
  | 'slot-closed'
  | 'unreachable'
  | 'occupied'
  | 'out-of-range'
  | 'cannot-attack'
  | 'insufficient-coins'
  | 'not-buildable'
  | 'unit-not-allowed'
  | 'already-built'
  | 'already-owned'
  | 'cannot-capture'
  | 'already-capturing'
  | 'full-health'
  | 'cannot-heal'
  | 'already-acted'
  | 'game-finished'
  | 'empty-batch';

/**
 * Base class for every error raised by the simulation core.
 */
export class HexlineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A caller-correctable rejection surfaced as an exception at a service boundary. */
export class MoveRejectedError extends HexlineError {
  readonly rejection: RejectionCode;
  readonly moveIndex: number;

  constructor(rejection: RejectionCode, message: string, moveIndex = 0) {
    super(rejection, message);
    this.rejection = rejection;
    this.moveIndex = moveIndex;
  }
}

export class InvariantViolationError extends HexlineError {
  constructor(message: string, options?: ErrorOptions) {
    super('invariant-violation', message, options);
  }
}

export class VersionMismatchError extends HexlineError {
  readonly expected: number;
  readonly actual: number;

  constructor(gameId: string, expected: number, actual: number) {
    super('version-mismatch', `game ${gameId} is at version ${actual}, update was based on ${expected}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class ReplayDivergenceError extends HexlineError {
  constructor(message: string, options?: ErrorOptions) {
    super('replay-divergence', message, options);
  }
}

export class GameNotFoundError extends HexlineError {
  readonly gameId: string;

  constructor(gameId: string) {
    super('game-not-found', `game ${gameId} not found`);
    this.gameId = gameId;
  }
}
