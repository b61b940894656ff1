import type { Board, Color, GameState, Move, Piece, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { DIAGONAL_DIRS, KING_DELTAS, KNIGHT_DELTAS, ORTHOGONAL_DIRS, isSquareAttacked } from './attack';
import { colOf, isOnBoard, rowOf, squareAt } from './square';

/**
 * Pseudo-legal move generation.
 *
 * Pseudo-legal means: piece movement rules are respected, but king safety is NOT checked.
 * Filtering to legal moves happens in legalMoves.ts. Castling is the exception: its
 * "not through check" conditions are part of eligibility and are checked here through
 * the attack primitive, which never calls back into move generation.
 */

type Direction = readonly [number, number];

function getPiece(board: Board, sq: Square): Piece | null {
  return board[sq] ?? null;
}

function pushMove(moves: Move[], from: Square, to: Square, opts?: Partial<Move>) {
  moves.push({ from, to, ...opts });
}

/** Row delta of a forward pawn step. White advances toward row 0. */
export function pawnDirection(color: Color): -1 | 1 {
  return color === 'w' ? -1 : 1;
}

export function pawnStartRow(color: Color): number {
  return color === 'w' ? 6 : 1;
}

export function promotionRow(color: Color): number {
  return color === 'w' ? 0 : 7;
}

function addPawnMoves(state: GameState, from: Square, piece: Piece, moves: Move[]) {
  const row = rowOf(from);
  const col = colOf(from);
  const dir = pawnDirection(piece.color);
  const lastRow = promotionRow(piece.color);

  // Single push
  const oneRow = row + dir;
  if (isOnBoard(oneRow, col)) {
    const one = squareAt(oneRow, col);
    if (getPiece(state.board, one) === null) {
      pushMove(moves, from, one, oneRow === lastRow ? { promotion: 'q' } : undefined);

      // Double push from the starting row (only if single push is clear)
      const twoRow = row + dir * 2;
      if (row === pawnStartRow(piece.color) && isOnBoard(twoRow, col)) {
        const two = squareAt(twoRow, col);
        if (getPiece(state.board, two) === null) {
          pushMove(moves, from, two, { isDoublePush: true });
        }
      }
    }
  }

  // Captures (diagonals)
  for (const dc of [-1, 1]) {
    if (!isOnBoard(oneRow, col + dc)) continue;
    const cap = squareAt(oneRow, col + dc);
    const target = getPiece(state.board, cap);
    if (target && target.color !== piece.color) {
      pushMove(moves, from, cap, oneRow === lastRow ? { promotion: 'q' } : undefined);
    }
  }

  // En passant: the enemy pawn that just advanced two squares stands beside us.
  const ep = state.lastDoublePawnAdvance;
  if (ep !== null) {
    const victim = getPiece(state.board, ep);
    if (
      victim &&
      victim.type === 'p' &&
      victim.color !== piece.color &&
      rowOf(ep) === row &&
      Math.abs(colOf(ep) - col) === 1 &&
      isOnBoard(oneRow, colOf(ep))
    ) {
      const to = squareAt(oneRow, colOf(ep));
      if (getPiece(state.board, to) === null) {
        pushMove(moves, from, to, { isEnPassant: true });
      }
    }
  }
}

function addStepMoves(
  state: GameState,
  from: Square,
  piece: Piece,
  moves: Move[],
  deltas: ReadonlyArray<Direction>
) {
  const row = rowOf(from);
  const col = colOf(from);

  for (const [dr, dc] of deltas) {
    const nr = row + dr;
    const nc = col + dc;
    if (!isOnBoard(nr, nc)) continue;
    const to = squareAt(nr, nc);
    const target = getPiece(state.board, to);
    if (!target || target.color !== piece.color) {
      pushMove(moves, from, to);
    }
  }
}

function addSlidingMoves(
  state: GameState,
  from: Square,
  piece: Piece,
  moves: Move[],
  directions: ReadonlyArray<Direction>
) {
  const row = rowOf(from);
  const col = colOf(from);

  for (const [dr, dc] of directions) {
    let nr = row + dr;
    let nc = col + dc;
    while (isOnBoard(nr, nc)) {
      const to = squareAt(nr, nc);
      const target = getPiece(state.board, to);
      if (!target) {
        pushMove(moves, from, to);
      } else {
        if (target.color !== piece.color) {
          pushMove(moves, from, to);
        }
        break; // blocked
      }
      nr += dr;
      nc += dc;
    }
  }
}

function canCastle(state: GameState, from: Square, king: Piece, side: 'k' | 'q'): boolean {
  const row = rowOf(from);
  const col = colOf(from);
  const rookCol = side === 'k' ? 7 : 0;
  const step = side === 'k' ? 1 : -1;

  // The king lands two squares over, strictly short of the rook's corner.
  const landingCol = col + 2 * step;
  if (side === 'k' ? landingCol >= rookCol : landingCol <= rookCol) return false;

  const rook = getPiece(state.board, squareAt(row, rookCol));
  if (!rook || rook.type !== 'r' || rook.color !== king.color || rook.hasMoved) return false;

  for (let c = Math.min(col, rookCol) + 1; c < Math.max(col, rookCol); c++) {
    if (getPiece(state.board, squareAt(row, c)) !== null) return false;
  }

  const enemy = oppositeColor(king.color);
  if (isSquareAttacked(state, from, enemy)) return false;
  for (const c of [col + step, landingCol]) {
    if (isSquareAttacked(state, squareAt(row, c), enemy)) return false;
  }

  return true;
}

function addKingMoves(state: GameState, from: Square, piece: Piece, moves: Move[]) {
  addStepMoves(state, from, piece, moves, KING_DELTAS);

  if (piece.hasMoved) return;
  const row = rowOf(from);
  const col = colOf(from);
  if (canCastle(state, from, piece, 'k')) {
    pushMove(moves, from, squareAt(row, col + 2), { isCastle: true, castleSide: 'k' });
  }
  if (canCastle(state, from, piece, 'q')) {
    pushMove(moves, from, squareAt(row, col - 2), { isCastle: true, castleSide: 'q' });
  }
}

/**
 * Pseudo-legal moves for whatever piece stands on `from`, of either color.
 * Returns an empty list for an empty square.
 */
export function generatePieceMoves(state: GameState, from: Square): Move[] {
  const moves: Move[] = [];
  const piece = getPiece(state.board, from);
  if (!piece) return moves;

  switch (piece.type) {
    case 'p':
      addPawnMoves(state, from, piece, moves);
      break;
    case 'n':
      addStepMoves(state, from, piece, moves, KNIGHT_DELTAS);
      break;
    case 'b':
      addSlidingMoves(state, from, piece, moves, DIAGONAL_DIRS);
      break;
    case 'r':
      addSlidingMoves(state, from, piece, moves, ORTHOGONAL_DIRS);
      break;
    case 'q':
      addSlidingMoves(state, from, piece, moves, [...ORTHOGONAL_DIRS, ...DIAGONAL_DIRS]);
      break;
    case 'k':
      addKingMoves(state, from, piece, moves);
      break;
  }
  return moves;
}

/**
 * Generates pseudo-legal moves for every piece of `color` (default: side to move).
 */
export function generatePseudoLegalMoves(state: GameState, color: Color = state.sideToMove): Move[] {
  const moves: Move[] = [];
  for (let sq = 0; sq < 64; sq++) {
    const p = state.board[sq];
    if (!p || p.color !== color) continue;
    moves.push(...generatePieceMoves(state, sq));
  }
  return moves;
}
