import type { Board, Color, GameState, Piece, PieceType, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { findKingSquare } from './board';
import { colOf, isOnBoard, rowOf, squareAt } from './square';

export const KNIGHT_DELTAS = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2]
] as const;

export const KING_DELTAS = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1]
] as const;

export const ORTHOGONAL_DIRS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
] as const;

export const DIAGONAL_DIRS = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1]
] as const;

function pieceAt(board: Board, row: number, col: number): Piece | null {
  if (!isOnBoard(row, col)) return null;
  return board[squareAt(row, col)] ?? null;
}

function isPiece(p: Piece | null, color: Color, type: PieceType): boolean {
  return !!p && p.color === color && p.type === type;
}

function rayHits(
  board: Board,
  row: number,
  col: number,
  dirs: ReadonlyArray<readonly [number, number]>,
  byColor: Color,
  types: readonly PieceType[]
): boolean {
  for (const [dr, dc] of dirs) {
    let r = row + dr;
    let c = col + dc;
    while (isOnBoard(r, c)) {
      const p = board[squareAt(r, c)];
      if (p) {
        if (p.color === byColor && types.includes(p.type)) return true;
        break;
      }
      r += dr;
      c += dc;
    }
  }
  return false;
}

/**
 * Returns true if `square` is attacked by any piece of `byColor`.
 *
 * Purely geometric: reads occupancy only, never generates moves, never mutates.
 * En passant is not an "attack" on the skipped square.
 */
export function isSquareAttacked(state: Pick<GameState, 'board'>, square: Square, byColor: Color): boolean {
  const board = state.board;
  const row = rowOf(square);
  const col = colOf(square);

  // Pawns capture toward the enemy back rank: white pawns move to lower rows,
  // so a white attacker sits one row below (higher index) the target.
  const pawnRow = byColor === 'w' ? row + 1 : row - 1;
  for (const dc of [-1, 1]) {
    if (isPiece(pieceAt(board, pawnRow, col + dc), byColor, 'p')) return true;
  }

  for (const [dr, dc] of KNIGHT_DELTAS) {
    if (isPiece(pieceAt(board, row + dr, col + dc), byColor, 'n')) return true;
  }

  for (const [dr, dc] of KING_DELTAS) {
    if (isPiece(pieceAt(board, row + dr, col + dc), byColor, 'k')) return true;
  }

  if (rayHits(board, row, col, ORTHOGONAL_DIRS, byColor, ['r', 'q'])) return true;
  if (rayHits(board, row, col, DIAGONAL_DIRS, byColor, ['b', 'q'])) return true;

  return false;
}

export function findKing(state: Pick<GameState, 'board'>, color: Color): Square | null {
  return findKingSquare(state.board, color);
}

/**
 * True if `color`'s king stands on an attacked square.
 * A board without that king (partial setups) is never in check.
 */
export function isKingInCheck(state: Pick<GameState, 'board'>, color: Color): boolean {
  const kingSq = findKingSquare(state.board, color);
  if (kingSq === null) return false;
  return isSquareAttacked(state, kingSq, oppositeColor(color));
}
