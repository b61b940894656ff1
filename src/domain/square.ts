import type { Square } from './chessTypes';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export function isSquare(x: unknown): x is Square {
  return typeof x === 'number' && Number.isInteger(x) && x >= 0 && x < 64;
}

export function isOnBoard(row: number, col: number): boolean {
  return row >= 0 && row < 8 && col >= 0 && col < 8;
}

export function rowOf(square: Square): number {
  return Math.floor(square / 8);
}

export function colOf(square: Square): number {
  return square % 8;
}

/**
 * Index for coordinates already known to be on the board.
 * Use `makeSquare` for anything that may fall off the edge.
 */
export function squareAt(row: number, col: number): Square {
  return row * 8 + col;
}

export function makeSquare(row: number, col: number): Square | null {
  if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
  if (!isOnBoard(row, col)) return null;
  return squareAt(row, col);
}

/**
 * Algebraic name of a square. Row 0 is rank 8, row 7 is rank 1.
 */
export function toAlgebraic(square: Square): string {
  const f = FILES[colOf(square)];
  const r = (8 - rowOf(square)).toString();
  return `${f}${r}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  if (typeof text !== 'string') return null;
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const col = FILES.findIndex((f) => f === t[0]);
  const rank = Number(t[1]);
  if (col < 0) return null;
  if (!Number.isInteger(rank) || rank < 1 || rank > 8) return null;
  return makeSquare(8 - rank, col);
}

/** Square color parity; equal parity means same-colored squares. */
export function squareParity(square: Square): 0 | 1 {
  return (rowOf(square) + colOf(square)) % 2 === 0 ? 0 : 1;
}
