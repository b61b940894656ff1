import type { GameState, Move } from '../chessTypes';
import { generateLegalMoves } from '../legalMoves';

export type Rng = () => number; // 0..1

// Simple xorshift32 for deterministic tests.
export function makeSeededRng(seed: number): Rng {
  let x = seed | 0 || 123456789;
  return () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    // Convert to [0,1)
    return (x >>> 0) / 0x1_0000_0000;
  };
}

/** Uniformly chosen legal move for the side to move, or null if there is none. */
export function pickRandomLegalMove(state: GameState, rng: Rng = Math.random): Move | null {
  const legal = generateLegalMoves(state);
  if (legal.length === 0) return null;
  const i = Math.min(legal.length - 1, Math.floor(rng() * legal.length));
  return legal[i];
}
