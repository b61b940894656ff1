import type { Move, MoveIntent } from '../chessTypes';
import { parseAlgebraicSquare, toAlgebraic } from '../square';

const UCI_MOVE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/** `e2e4`; a history entry that promoted gets its letter (`e7e8q`). */
export function moveToUci(move: Move): string {
  return toAlgebraic(move.from) + toAlgebraic(move.to) + (move.promotion ?? '');
}

/**
 * Reads an engine's move as a plain from/to intent.
 *
 * A promotion letter is accepted but not kept: pawns always become queens here,
 * so `a7a8n` is the same request as `a7a8`.
 */
export function parseUciMove(text: string): MoveIntent | null {
  const m = UCI_MOVE.exec(text.trim().toLowerCase());
  if (!m) return null;
  const from = parseAlgebraicSquare(m[1]);
  const to = parseAlgebraicSquare(m[2]);
  return from === null || to === null ? null : { from, to };
}
