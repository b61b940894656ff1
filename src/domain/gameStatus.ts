import type { Color, GameState, GameStatus, Piece, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { findKingSquare } from './board';
import { squareParity } from './square';
import { hasAnyLegalMove } from './legalMoves';
import { isKingInCheck } from './attack';
import { positionKey } from './notation/fen';

export const FIFTY_MOVE_HALFMOVES = 100;
export const REPETITION_LIMIT = 3;

export function isCheckmate(state: GameState, color: Color): boolean {
  return isKingInCheck(state, color) && !hasAnyLegalMove(state, color);
}

export function isStalemate(state: GameState, color: Color): boolean {
  return !isKingInCheck(state, color) && !hasAnyLegalMove(state, color);
}

export function isInsufficientMaterial(state: GameState): boolean {
  // Exercise boards without both kings are never drawn on material.
  if (findKingSquare(state.board, 'w') === null || findKingSquare(state.board, 'b') === null) return false;

  const nonKingPieces: Array<{ piece: Piece; square: Square }> = [];
  for (let i = 0; i < 64; i++) {
    const p = state.board[i];
    if (!p) continue;
    if (p.type === 'k') continue;
    nonKingPieces.push({ piece: p, square: i });
  }

  if (nonKingPieces.length === 0) return true; // K vs K

  // Any pawns, rooks, or queens mean sufficient material.
  if (nonKingPieces.some(({ piece }) => piece.type === 'p' || piece.type === 'r' || piece.type === 'q')) {
    return false;
  }

  if (nonKingPieces.length === 1) return true; // K+N vs K, K+B vs K

  if (nonKingPieces.length === 2) {
    const [a, b] = nonKingPieces;
    // K+B vs K+B (bishops on same color)
    if (a.piece.type === 'b' && b.piece.type === 'b' && a.piece.color !== b.piece.color) {
      return squareParity(a.square) === squareParity(b.square);
    }
  }

  return false;
}

export function isFiftyMoveDraw(state: GameState): boolean {
  return state.halfmoveClock >= FIFTY_MOVE_HALFMOVES;
}

export function isThreefoldRepetition(state: GameState): boolean {
  return (state.positionCounts[positionKey(state)] ?? 0) >= REPETITION_LIMIT;
}

/**
 * Derive the result for the side to move.
 *
 * Checkmate and stalemate decide first. A side without a king on the board (partial
 * exercise setups) is never mated or stalemated; the draw rules still apply.
 */
export function getGameStatus(state: GameState): GameStatus {
  const stm = state.sideToMove;

  if (findKingSquare(state.board, stm) !== null && !hasAnyLegalMove(state, stm)) {
    if (isKingInCheck(state, stm)) {
      return { kind: 'checkmate', winner: oppositeColor(stm) };
    }
    return { kind: 'stalemate' };
  }

  if (isInsufficientMaterial(state)) return { kind: 'drawInsufficientMaterial' };
  if (isFiftyMoveDraw(state)) return { kind: 'drawFiftyMove' };
  if (isThreefoldRepetition(state)) return { kind: 'drawRepetition' };

  return { kind: 'inProgress' };
}
