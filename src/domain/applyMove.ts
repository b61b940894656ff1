import type { Board, GameState, Move, Piece, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { getPiece } from './board';
import { InvariantViolationError } from './errors';
import { promotionRow } from './movegen';
import { positionKey } from './notation/fen';
import { colOf, rowOf, squareAt, toAlgebraic } from './square';

/**
 * Apply a move and return the next state.
 *
 * Assumptions:
 * - The caller provides a legal move (typically checked through `tryMove`); nothing is
 *   re-validated here.
 * - The input state is left untouched. All side effects (rook relocation, en passant
 *   removal, promotion) are written into a fresh board, so the move lands whole or not at all.
 * - `result` is carried over; the game layer recomputes it.
 */

function moved(piece: Piece): Piece {
  return { ...piece, hasMoved: true };
}

function relocateCastlingRook(board: Board, row: number, kingToCol: number, side: 'k' | 'q') {
  const rookFrom = squareAt(row, side === 'k' ? 7 : 0);
  const rookTo = squareAt(row, side === 'k' ? kingToCol - 1 : kingToCol + 1);
  const rook = board[rookFrom];
  if (!rook) return;
  board[rookFrom] = null;
  board[rookTo] = moved(rook);
}

export function applyMove(state: GameState, from: Square, to: Square): GameState {
  const moving = getPiece(state.board, from);
  if (!moving) {
    throw new InvariantViolationError(`applyMove: no piece on ${toAlgebraic(from)}`);
  }

  const board: Board = state.board.slice();
  const fromRow = rowOf(from);
  const fromCol = colOf(from);
  const toRow = rowOf(to);
  const toCol = colOf(to);

  let captured: Piece | null = getPiece(board, to);
  const move: Move = { from, to };

  // Castling: king travels two columns, rook jumps over it.
  if (moving.type === 'k' && !moving.hasMoved && Math.abs(toCol - fromCol) === 2) {
    move.isCastle = true;
    move.castleSide = toCol > fromCol ? 'k' : 'q';
    relocateCastlingRook(board, fromRow, toCol, move.castleSide);
  }

  // En passant: diagonal pawn step onto an empty square takes the pawn beside us.
  if (moving.type === 'p' && toCol !== fromCol && captured === null) {
    const capSq = squareAt(fromRow, toCol);
    captured = getPiece(board, capSq);
    board[capSq] = null;
    move.isEnPassant = true;
  }

  // Relocate (promoting on the last row) and mark moved.
  board[from] = null;
  if (moving.type === 'p' && toRow === promotionRow(moving.color)) {
    board[to] = { color: moving.color, type: 'q', hasMoved: true };
    move.promotion = 'q';
  } else {
    board[to] = moved(moving);
  }

  // En passant window lasts exactly one reply.
  const isDoublePush = moving.type === 'p' && Math.abs(toRow - fromRow) === 2;
  if (isDoublePush) move.isDoublePush = true;
  const lastDoublePawnAdvance = isDoublePush ? to : null;

  move.captured = captured;

  const sideToMove = oppositeColor(state.sideToMove);
  const halfmoveClock = captured || moving.type === 'p' ? 0 : state.halfmoveClock + 1;
  // Fullmove number increments after black moves.
  const fullmoveNumber = state.sideToMove === 'b' ? state.fullmoveNumber + 1 : state.fullmoveNumber;

  const key = positionKey({ board, sideToMove, lastDoublePawnAdvance, halfmoveClock, fullmoveNumber });

  return {
    ...state,
    board,
    sideToMove,
    history: [...state.history, move],
    lastDoublePawnAdvance,
    halfmoveClock,
    fullmoveNumber,
    positionCounts: { ...state.positionCounts, [key]: (state.positionCounts[key] ?? 0) + 1 }
  };
}
