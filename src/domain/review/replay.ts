import type { GameState, Move, MoveIntent } from '../chessTypes';
import type { MalformedReplay } from '../errors';
import { newGame, tryMove } from '../game';
import type { Logger } from '../logger';
import { getLogger } from '../logger';
import { moveToUci } from '../notation/uci';

export type ReplayFrame = {
  /** Ply index: 0 = initial position, 1 = after first applied move, ... */
  ply: number;
  /** State after applying moves up to `ply`. */
  state: GameState;
  /** The move that produced this frame (undefined for ply 0). */
  move?: Move;
};

export type ReplayResult = {
  /** Final reconstructed state. */
  state: GameState;
  frames: ReplayFrame[];
  /** Number of input moves that were applied. */
  applied: number;
  diagnostics: MalformedReplay[];
  /** True when every input move was applied. */
  ok: boolean;
};

export type ReplayOptions = {
  /** Stop at the first malformed move instead of skipping it (default false). */
  stopOnError?: boolean;
  /** Starting position (default: a new game). */
  initial?: GameState;
  logger?: Logger;
};

/**
 * Rebuild a game from a list of (from, to) moves.
 *
 * - Pure & deterministic: the same list yields the same frames.
 * - A move that is not legal in the reconstructed position is skipped and reported;
 *   nothing is substituted for it.
 */
export function replayMoves(moves: readonly MoveIntent[], opts?: ReplayOptions): ReplayResult {
  const stopOnError = opts?.stopOnError ?? false;
  const logger = opts?.logger ?? getLogger();

  let state = opts?.initial ?? newGame();
  const frames: ReplayFrame[] = [{ ply: 0, state }];
  const diagnostics: MalformedReplay[] = [];

  for (let i = 0; i < moves.length; i++) {
    const move = moves[i];
    const r = tryMove(state, move.from, move.to);
    if (!r.ok) {
      const diag: MalformedReplay = { ply: i + 1, move: { from: move.from, to: move.to }, reason: r.error.reason };
      diagnostics.push(diag);
      logger.warn(`replay: skipping ${moveToUci(move)} at ply ${diag.ply} (${diag.reason})`);
      if (stopOnError) break;
      continue;
    }

    state = r.value;
    frames.push({ ply: frames.length, state, move: state.history[state.history.length - 1] });
  }

  return {
    state,
    frames,
    applied: frames.length - 1,
    diagnostics,
    ok: diagnostics.length === 0
  };
}

/** Helper to read a frame safely (clamps to [0, lastPly]). */
export function getReplayStateAtPly(result: ReplayResult, ply: number): GameState {
  const clamped = Math.max(0, Math.min(ply, result.frames.length - 1));
  return result.frames[clamped].state;
}
