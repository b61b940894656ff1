/**
 * Core chess domain types.
 *
 * Keep these types UI-agnostic and JSON-serializable.
 */

/** Color: white ('w') or black ('b'). */
export type Color = 'w' | 'b';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * A piece does not know its own square: the board index is the only position.
 * `hasMoved` flips to true on the first move and never resets.
 */
export type Piece = {
  color: Color;
  type: PieceType;
  hasMoved: boolean;
};

/**
 * 0–63 square index: `row * 8 + col`.
 *
 * Convention:
 * - row 0 is the far rank (black back rank, a8..h8)
 * - row 7 is the near rank (white back rank, a1..h1)
 * - 0 = a8, 7 = h8, 56 = a1, 63 = h1
 */
export type Square = number;

/** Promotion always yields a queen. */
export type PromotionPiece = 'q';

/** What a caller asks for: move whatever stands on `from` to `to`. */
export type MoveIntent = {
  from: Square;
  to: Square;
};

/**
 * A generated or applied move. Flags are filled in during move generation
 * and carried into history by applyMove.
 */
export type Move = MoveIntent & {
  promotion?: PromotionPiece;

  /** True for castling moves. */
  isCastle?: boolean;
  /** If isCastle, side is 'k' (king-side) or 'q' (queen-side). */
  castleSide?: 'k' | 'q';

  /** True for en passant captures. */
  isEnPassant?: boolean;
  /** True for a two-square pawn advance. */
  isDoublePush?: boolean;

  /** Captured piece (filled by applyMove). */
  captured?: Piece | null;
};

export type GameStatus =
  | { kind: 'inProgress' }
  | { kind: 'checkmate'; winner: Color }
  | { kind: 'stalemate' }
  | { kind: 'drawInsufficientMaterial' }
  | { kind: 'drawFiftyMove' }
  | { kind: 'drawRepetition' };

export type Board = Array<Piece | null>;

export type GameState = {
  board: Board;
  sideToMove: Color;
  /** Played moves, oldest first. Append-only. */
  history: Move[];
  /**
   * Destination of the immediately preceding move if it was a two-square pawn advance.
   * Cleared by every other move, so en passant is available for exactly one reply.
   */
  lastDoublePawnAdvance: Square | null;
  /** Halfmove clock for the 50-move rule. */
  halfmoveClock: number;
  /** Fullmove number (starts at 1). */
  fullmoveNumber: number;
  /** Occurrences of each position key (see notation/fen.ts). */
  positionCounts: Record<string, number>;
  result: GameStatus;
  /** Bumped on every reset so late oracle answers can be recognised. */
  generation: number;
};

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}

export function isGameOver(state: GameState): boolean {
  return state.result.kind !== 'inProgress';
}
