import type { Color, GameState, PieceType, Square } from './chessTypes';
import { assertBoardInvariants, createEmptyBoard, createStartingBoard, makePiece } from './board';
import { InvariantViolationError } from './errors';
import { getGameStatus } from './gameStatus';
import { positionKey } from './notation/fen';
import { isSquare, toAlgebraic } from './square';

export type PiecePlacement = {
  square: Square;
  color: Color;
  type: PieceType;
  hasMoved?: boolean;
};

/** A position to start from: a piece list plus the little context FEN would carry. */
export type PositionSetup = {
  pieces: PiecePlacement[];
  sideToMove?: Color;
  lastDoublePawnAdvance?: Square | null;
  halfmoveClock?: number;
  fullmoveNumber?: number;
  generation?: number;
};

function finalize(state: Omit<GameState, 'positionCounts' | 'result'>): GameState {
  const withCounts = { ...state, positionCounts: { [positionKey(state)]: 1 }, result: { kind: 'inProgress' as const } };
  return { ...withCounts, result: getGameStatus(withCounts) };
}

export function createInitialGameState(generation = 0): GameState {
  const board = createStartingBoard();
  assertBoardInvariants(board, { requireKings: true });
  return finalize({
    board,
    sideToMove: 'w',
    history: [],
    lastDoublePawnAdvance: null,
    halfmoveClock: 0,
    fullmoveNumber: 1,
    generation
  });
}

/**
 * Build a state from an arbitrary piece list.
 *
 * Two pieces on one square, or two kings of one color, are rejected with
 * `InvariantViolationError`. Kings are optional so drills can use partial boards.
 */
export function createGameState(setup: PositionSetup): GameState {
  const board = createEmptyBoard();
  for (const p of setup.pieces) {
    if (!isSquare(p.square)) {
      throw new InvariantViolationError(`Invalid square index ${String(p.square)}`);
    }
    if (board[p.square]) {
      throw new InvariantViolationError(`Two pieces placed on ${toAlgebraic(p.square)}`);
    }
    board[p.square] = makePiece(p.color, p.type, p.hasMoved ?? false);
  }
  assertBoardInvariants(board);

  return finalize({
    board,
    sideToMove: setup.sideToMove ?? 'w',
    history: [],
    lastDoublePawnAdvance: setup.lastDoublePawnAdvance ?? null,
    halfmoveClock: setup.halfmoveClock ?? 0,
    fullmoveNumber: setup.fullmoveNumber ?? 1,
    generation: setup.generation ?? 0
  });
}
