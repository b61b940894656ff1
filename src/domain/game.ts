import type { GameState, GameStatus, Square } from './chessTypes';
import { isGameOver } from './chessTypes';
import { applyMove } from './applyMove';
import { getPiece } from './board';
import { IllegalMoveError } from './errors';
import { createInitialGameState } from './gameState';
import { getGameStatus } from './gameStatus';
import { generateLegalMoves } from './legalMoves';

/**
 * The surface the application layer talks to. Every function takes a state value and
 * returns a new one; nothing here mutates its input.
 */

export type TryMoveResult = { ok: true; value: GameState } | { ok: false; error: IllegalMoveError };

export function newGame(): GameState {
  return createInitialGameState();
}

/** Destinations for the piece on `square`; empty when it cannot move now. */
export function legalMoves(state: GameState, square: Square): Set<Square> {
  if (isGameOver(state)) return new Set();
  return new Set(generateLegalMoves(state, square).map((m) => m.to));
}

export function tryMove(state: GameState, from: Square, to: Square): TryMoveResult {
  if (isGameOver(state)) {
    return { ok: false, error: new IllegalMoveError(from, to, 'gameOver') };
  }

  const piece = getPiece(state.board, from);
  if (!piece) return { ok: false, error: new IllegalMoveError(from, to, 'emptySquare') };
  if (piece.color !== state.sideToMove) {
    return { ok: false, error: new IllegalMoveError(from, to, 'wrongSide') };
  }

  const legal = generateLegalMoves(state, from);
  if (!legal.some((m) => m.to === to)) {
    return { ok: false, error: new IllegalMoveError(from, to, 'illegalDestination') };
  }

  const next = applyMove(state, from, to);
  return { ok: true, value: { ...next, result: getGameStatus(next) } };
}

export function status(state: GameState): GameStatus {
  return state.result;
}

/** Discard the game and start over. The generation counter moves on. */
export function reset(state: GameState): GameState {
  return createInitialGameState(state.generation + 1);
}
