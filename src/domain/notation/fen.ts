import type { Board, Color, GameState, Piece, Square } from '../chessTypes';
import { colOf, rowOf, squareAt, toAlgebraic } from '../square';

/**
 * FEN emission. Used to hand positions to a UCI engine and to key positions for
 * repetition detection. Parsing FEN is out of scope.
 */

export type FenSource = Pick<
  GameState,
  'board' | 'sideToMove' | 'lastDoublePawnAdvance' | 'halfmoveClock' | 'fullmoveNumber'
>;

function pieceToFenChar(p: Piece): string {
  const c = p.type;
  return p.color === 'w' ? c.toUpperCase() : c;
}

function placementField(board: Board): string {
  const ranks: string[] = [];

  // Row 0 is rank 8, which FEN lists first.
  for (let row = 0; row < 8; row++) {
    let empty = 0;
    let out = '';
    for (let col = 0; col < 8; col++) {
      const p = board[squareAt(row, col)];
      if (!p) {
        empty++;
      } else {
        if (empty > 0) {
          out += String(empty);
          empty = 0;
        }
        out += pieceToFenChar(p);
      }
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }

  return ranks.join('/');
}

function isUnmoved(board: Board, square: Square, color: Color, type: Piece['type']): boolean {
  const p = board[square];
  return !!p && p.color === color && p.type === type && !p.hasMoved;
}

/** Castling availability as implied by the moved-flags of kings and corner rooks. */
function castlingField(board: Board): string {
  let out = '';
  for (const [color, row] of [
    ['w', 7],
    ['b', 0]
  ] as const) {
    if (!isUnmoved(board, squareAt(row, 4), color, 'k')) continue;
    const k = isUnmoved(board, squareAt(row, 7), color, 'r') ? 'k' : '';
    const q = isUnmoved(board, squareAt(row, 0), color, 'r') ? 'q' : '';
    const rights = k + q;
    out += color === 'w' ? rights.toUpperCase() : rights;
  }
  return out === '' ? '-' : out;
}

/** The square a double-pushed pawn passed over, or null. */
export function enPassantTargetSquare(state: Pick<GameState, 'board' | 'lastDoublePawnAdvance'>): Square | null {
  const sq = state.lastDoublePawnAdvance;
  if (sq === null) return null;
  const pawn = state.board[sq];
  if (!pawn || pawn.type !== 'p') return null;
  // White pawns advance toward row 0, so the skipped square is one row "behind" them.
  const behind = pawn.color === 'w' ? 1 : -1;
  return squareAt(rowOf(sq) + behind, colOf(sq));
}

function hasAdjacentEnemyPawn(state: FenSource, sq: Square): boolean {
  const pawn = state.board[sq];
  if (!pawn) return false;
  const row = rowOf(sq);
  for (const dc of [-1, 1]) {
    const col = colOf(sq) + dc;
    if (col < 0 || col > 7) continue;
    const p = state.board[squareAt(row, col)];
    if (p && p.type === 'p' && p.color !== pawn.color) return true;
  }
  return false;
}

/** Convert a state to a FEN string. */
export function toFen(state: FenSource): string {
  const target = enPassantTargetSquare(state);
  const ep = target === null ? '-' : toAlgebraic(target);
  return `${placementField(state.board)} ${state.sideToMove} ${castlingField(state.board)} ${ep} ${state.halfmoveClock} ${state.fullmoveNumber}`;
}

/**
 * Repetition key: placement, side to move, castling availability, and the en passant
 * square only when an enemy pawn could actually take there.
 */
export function positionKey(state: FenSource): string {
  const sq = state.lastDoublePawnAdvance;
  const target = sq !== null && hasAdjacentEnemyPawn(state, sq) ? enPassantTargetSquare(state) : null;
  const ep = target === null ? '-' : toAlgebraic(target);
  return `${placementField(state.board)} ${state.sideToMove} ${castlingField(state.board)} ${ep}`;
}
