import { createInitialGameState } from '../gameState';
import { assertBoardInvariants, countPieces, createEmptyBoard, getPiece, makePiece, setPiece } from '../board';
import { InvariantViolationError } from '../errors';
import { toFen } from '../notation/fen';
import { sq } from './helpers';

describe('starting position', () => {
  it('has 32 pieces with the right layout', () => {
    const s = createInitialGameState();
    expect(countPieces(s.board)).toBe(32);

    expect(getPiece(s.board, sq('e1'))).toEqual({ color: 'w', type: 'k', hasMoved: false });
    expect(getPiece(s.board, sq('d1'))).toEqual({ color: 'w', type: 'q', hasMoved: false });
    expect(getPiece(s.board, sq('e8'))).toEqual({ color: 'b', type: 'k', hasMoved: false });
    expect(getPiece(s.board, sq('d8'))).toEqual({ color: 'b', type: 'q', hasMoved: false });
    expect(getPiece(s.board, sq('a2'))?.type).toBe('p');
    expect(getPiece(s.board, sq('h7'))?.color).toBe('b');
    expect(getPiece(s.board, sq('e4'))).toBeNull();
  });

  it('starts with white to move and an empty history', () => {
    const s = createInitialGameState();
    expect(s.sideToMove).toBe('w');
    expect(s.history).toEqual([]);
    expect(s.lastDoublePawnAdvance).toBeNull();
    expect(s.result).toEqual({ kind: 'inProgress' });
    expect(s.generation).toBe(0);
    expect(toFen(s)).toBe('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1');
  });

  it('counts the starting position once for repetition', () => {
    const s = createInitialGameState();
    expect(Object.values(s.positionCounts)).toEqual([1]);
  });
});

describe('board invariants', () => {
  it('setPiece returns a copy', () => {
    const b = createEmptyBoard();
    const next = setPiece(b, 0, makePiece('w', 'k'));
    expect(b[0]).toBeNull();
    expect(next[0]).toEqual({ color: 'w', type: 'k', hasMoved: false });
  });

  it('rejects two kings of one color', () => {
    let b = createEmptyBoard();
    b = setPiece(b, 0, makePiece('w', 'k'));
    b = setPiece(b, 9, makePiece('w', 'k'));
    expect(() => assertBoardInvariants(b)).toThrow(InvariantViolationError);
  });

  it('requires kings only when asked', () => {
    const b = setPiece(createEmptyBoard(), 0, makePiece('w', 'k'));
    expect(() => assertBoardInvariants(b)).not.toThrow();
    expect(() => assertBoardInvariants(b, { requireKings: true })).toThrow('Missing black king');
  });
});
