import type { Board, Color, Piece, PieceType, Square } from './chessTypes';
import { InvariantViolationError } from './errors';
import { squareAt } from './square';

export const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

export function createEmptyBoard(): Board {
  return Array.from({ length: 64 }, () => null);
}

export function getPiece(board: Board, square: Square): Piece | null {
  return board[square] ?? null;
}

export function setPiece(board: Board, square: Square, piece: Piece | null): Board {
  const next = board.slice();
  next[square] = piece;
  return next;
}

export function makePiece(color: Color, type: PieceType, hasMoved = false): Piece {
  return { color, type, hasMoved };
}

/**
 * Standard chess starting position.
 *
 * Black occupies rows 0-1, white rows 6-7.
 */
export function createStartingBoard(): Board {
  const b = createEmptyBoard();

  for (let col = 0; col < 8; col++) {
    b[squareAt(0, col)] = makePiece('b', BACK_RANK[col]);
    b[squareAt(1, col)] = makePiece('b', 'p');
    b[squareAt(6, col)] = makePiece('w', 'p');
    b[squareAt(7, col)] = makePiece('w', BACK_RANK[col]);
  }

  return b;
}

export function countPieces(board: Board): number {
  let n = 0;
  for (const sq of board) {
    if (sq) n++;
  }
  return n;
}

export function findKingSquare(board: Board, color: Color): Square | null {
  for (let sq = 0; sq < 64; sq++) {
    const p = board[sq];
    if (p && p.type === 'k' && p.color === color) return sq;
  }
  return null;
}

/**
 * Fails loudly on shapes the rules never produce.
 */
export function assertBoardInvariants(board: Board, opts?: { requireKings?: boolean }): void {
  if (board.length !== 64) {
    throw new InvariantViolationError(`Board must have 64 squares, found ${board.length}`);
  }

  const kings: Record<Color, number> = { w: 0, b: 0 };
  for (const p of board) {
    if (p && p.type === 'k') kings[p.color]++;
  }

  for (const color of ['w', 'b'] as const) {
    if (kings[color] > 1) {
      throw new InvariantViolationError(`Found ${kings[color]} ${color === 'w' ? 'white' : 'black'} kings`);
    }
    if (opts?.requireKings && kings[color] === 0) {
      throw new InvariantViolationError(`Missing ${color === 'w' ? 'white' : 'black'} king`);
    }
  }
}
