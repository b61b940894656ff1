import type { MoveIntent, Square } from './chessTypes';
import { toAlgebraic } from './square';

export type IllegalMoveReason = 'gameOver' | 'emptySquare' | 'wrongSide' | 'illegalDestination';

/**
 * Returned (not thrown) by `tryMove` when the requested move is not in the legal set.
 */
export class IllegalMoveError extends Error {
  readonly from: Square;
  readonly to: Square;
  readonly reason: IllegalMoveReason;

  constructor(from: Square, to: Square, reason: IllegalMoveReason) {
    super(`Illegal move ${toAlgebraic(from)}-${toAlgebraic(to)} (${reason})`);
    this.name = 'IllegalMoveError';
    this.from = from;
    this.to = to;
    this.reason = reason;
  }
}

/**
 * The move oracle could not produce a move: the engine failed to start, exited,
 * timed out, or answered with nothing usable.
 */
export class OracleUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailableError';
  }
}

/** A core bug: the board is in a shape the rules never produce. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/** A replayed move that is not legal in the reconstructed position. */
export type MalformedReplay = {
  /** Ply index (1-based). */
  ply: number;
  move: MoveIntent;
  reason: string;
};

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function makeAbortError(): Error {
  return Object.assign(new Error('Aborted'), { name: 'AbortError' });
}
