import type { Color, GameState, Move, Square } from './chessTypes';
import { getPiece } from './board';
import { colOf, rowOf, squareAt } from './square';
import { isKingInCheck } from './attack';
import { generatePieceMoves, generatePseudoLegalMoves } from './movegen';

/**
 * Would moving the piece on `from` to `to` leave its own king in check?
 *
 * The state's board is borrowed: the piece is moved in place, the check is evaluated,
 * and the `finally` block puts every touched square back, whatever happens in between.
 * Only the moving piece is relocated, plus the pawn taken en passant so that a pin
 * along the rank is seen. Castling rooks are not moved; castling eligibility already
 * covers the squares the king crosses.
 */
export function wouldMoveCauseSelfCheck(state: GameState, from: Square, to: Square): boolean {
  const board = state.board;
  const moving = getPiece(board, from);
  if (!moving) return false;

  const captured = getPiece(board, to);

  // Pawn changing column onto an empty square: the victim sits beside the origin.
  let epSquare: Square | null = null;
  if (moving.type === 'p' && colOf(from) !== colOf(to) && captured === null) {
    epSquare = squareAt(rowOf(from), colOf(to));
  }
  const epVictim = epSquare === null ? null : getPiece(board, epSquare);

  try {
    board[from] = null;
    board[to] = moving;
    if (epSquare !== null) board[epSquare] = null;
    return isKingInCheck(state, moving.color);
  } finally {
    if (epSquare !== null) board[epSquare] = epVictim;
    board[to] = captured;
    board[from] = moving;
  }
}

/**
 * Candidate moves for the piece on `from`, minus those that leave its king in check.
 */
export function filterLegal(state: GameState, from: Square, candidates: Move[]): Move[] {
  return candidates.filter((m) => m.from === from && !wouldMoveCauseSelfCheck(state, from, m.to));
}

/**
 * Legal moves for the side to move.
 *
 * If `fromSquare` is provided, only moves of that piece are generated (empty when it
 * belongs to the other side).
 */
export function generateLegalMoves(state: GameState, fromSquare?: Square): Move[] {
  if (typeof fromSquare === 'number') {
    const piece = getPiece(state.board, fromSquare);
    if (!piece || piece.color !== state.sideToMove) return [];
    return filterLegal(state, fromSquare, generatePieceMoves(state, fromSquare));
  }
  return generateLegalMovesForColor(state, state.sideToMove);
}

/** Legal moves for every piece of `color`, regardless of whose turn it is. */
export function generateLegalMovesForColor(state: GameState, color: Color): Move[] {
  return generatePseudoLegalMoves(state, color).filter((m) => !wouldMoveCauseSelfCheck(state, m.from, m.to));
}

export function hasAnyLegalMove(state: GameState, color: Color): boolean {
  for (let sq = 0; sq < 64; sq++) {
    const p = state.board[sq];
    if (!p || p.color !== color) continue;
    if (filterLegal(state, sq, generatePieceMoves(state, sq)).length > 0) return true;
  }
  return false;
}
