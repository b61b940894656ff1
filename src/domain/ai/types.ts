import type { GameState, MoveIntent } from '../chessTypes';

/**
 * Oracle boundary types.
 *
 * The oracle is an outside move supplier (typically a UCI engine process). The rules
 * core never trusts it: every answer is checked against the legal moves.
 */

export type OracleRequest = {
  /**
   * Snapshot of game state at the time the move was requested.
   * Oracles must treat this as immutable.
   */
  state: GameState;
  /** Thinking budget in milliseconds. Absent: the oracle's own configured time. */
  timeBudgetMs?: number;
  /** Optional request id for tracing/debugging. */
  requestId?: string;
};

export interface MoveOracle {
  init?(): Promise<void>;
  /**
   * Suggest a move for the side to move, or null when the oracle has nothing.
   *
   * The AbortSignal MUST be observed by implementations so callers can cancel work.
   */
  bestMove(request: OracleRequest, signal: AbortSignal): Promise<MoveIntent | null>;
  dispose?(): Promise<void>;
}
