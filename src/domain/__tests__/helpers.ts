import type { Color, GameState, MoveIntent, PieceType, Square } from '../chessTypes';
import type { PiecePlacement, PositionSetup } from '../gameState';
import { createGameState } from '../gameState';
import { parseAlgebraicSquare, toAlgebraic } from '../square';

export function sq(name: string): Square {
  const s = parseAlgebraicSquare(name);
  if (s === null) throw new Error(`Bad square in test: ${name}`);
  return s;
}

/** 'e2e4' -> { from, to } */
export function mv(uci: string): MoveIntent {
  return { from: sq(uci.slice(0, 2)), to: sq(uci.slice(2, 4)) };
}

const TYPES: readonly PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];

function isPieceType(c: string): c is PieceType {
  return TYPES.some((t) => t === c);
}

/**
 * FEN-style piece tokens: uppercase is white, lowercase black, then the square.
 * A trailing '*' marks the piece as already moved. Example: ['Ke1', 'Rh1', 'ke8', 'pd7*'].
 */
export function pieces(tokens: string[]): PiecePlacement[] {
  return tokens.map((t) => {
    const letter = t[0];
    const type = letter.toLowerCase();
    if (!isPieceType(type)) throw new Error(`Bad piece in test: ${t}`);
    const color: Color = letter === type ? 'b' : 'w';
    return { color, type, square: sq(t.slice(1, 3)), hasMoved: t.endsWith('*') };
  });
}

export function position(tokens: string[], opts: Omit<PositionSetup, 'pieces'> = {}): GameState {
  return createGameState({ ...opts, pieces: pieces(tokens) });
}

export function names(squares: Iterable<Square>): string[] {
  return [...squares].map(toAlgebraic).sort();
}
