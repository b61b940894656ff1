import { findKing, isKingInCheck, isSquareAttacked } from '../attack';
import { toFen } from '../notation/fen';
import { position, sq } from './helpers';

describe('attack detection', () => {
  it('white pawns attack toward rank 8, black pawns toward rank 1', () => {
    const s = position(['Pe4*', 'pd5*']);
    expect(isSquareAttacked(s, sq('d5'), 'w')).toBe(true);
    expect(isSquareAttacked(s, sq('f5'), 'w')).toBe(true);
    expect(isSquareAttacked(s, sq('d3'), 'w')).toBe(false);
    expect(isSquareAttacked(s, sq('e4'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('c4'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('d6'), 'b')).toBe(false);
  });

  it('a pawn does not attack the square in front of it', () => {
    const s = position(['Pe4*']);
    expect(isSquareAttacked(s, sq('e5'), 'w')).toBe(false);
  });

  it('sliders stop at the first occupied square', () => {
    const s = position(['ra8', 'Pa4*']);
    expect(isSquareAttacked(s, sq('a5'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('a4'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('a3'), 'b')).toBe(false);
  });

  it('knights and kings attack their step squares', () => {
    const s = position(['ng8', 'kb8']);
    expect(isSquareAttacked(s, sq('f6'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('e7'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('a7'), 'b')).toBe(true);
    expect(isSquareAttacked(s, sq('b6'), 'b')).toBe(false);
  });

  it('does not change the state and answers the same when asked twice', () => {
    const s = position(['Ke1', 'qe8', 'Nd2', 'Pf2']);
    const before = toFen(s);
    const board = s.board.slice();
    const first = isSquareAttacked(s, sq('e2'), 'b');
    const second = isSquareAttacked(s, sq('e2'), 'b');
    expect(first).toBe(true);
    expect(second).toBe(first);
    expect(toFen(s)).toBe(before);
    expect(s.board).toEqual(board);
  });

  it('reports check only for the king of the given color', () => {
    const s = position(['Ke1', 'ke8', 'Re4']);
    expect(isKingInCheck(s, 'b')).toBe(true);
    expect(isKingInCheck(s, 'w')).toBe(false);
  });

  it('a missing king is never in check', () => {
    const s = position(['Ke1', 'Re4']);
    expect(findKing(s, 'b')).toBeNull();
    expect(isKingInCheck(s, 'b')).toBe(false);
  });
});
