import { generateLegalMoves, hasAnyLegalMove, wouldMoveCauseSelfCheck } from '../legalMoves';
import { isKingInCheck } from '../attack';
import { applyMove } from '../applyMove';
import { legalMoves } from '../game';
import { createInitialGameState } from '../gameState';
import { names, position, sq } from './helpers';

describe('legal move filtering', () => {
  it('has 20 legal moves from the starting position', () => {
    expect(generateLegalMoves(createInitialGameState())).toHaveLength(20);
  });

  it('a pinned piece cannot leave the line to its king', () => {
    const s = position(['Ke1', 'Re2', 're8', 'ka8']);
    expect(names(generateLegalMoves(s, sq('e2')).map((m) => m.to))).toEqual(['e3', 'e4', 'e5', 'e6', 'e7', 'e8']);
  });

  it('in check, only moves that resolve it are legal', () => {
    const s = position(['Ke1', 'Na3', 're8', 'ka8']);
    // The knight cannot block the e-file from a3, and the king must step aside.
    expect(generateLegalMoves(s, sq('a3'))).toEqual([]);
    expect(names(generateLegalMoves(s, sq('e1')).map((m) => m.to))).toEqual(['d1', 'd2', 'f1', 'f2']);
  });

  it('the king cannot capture a protected piece', () => {
    const s = position(['Ke1', 'pd2*', 'pc3*', 'ka8']);
    expect(names(legalMoves(s, sq('e1')))).toEqual(['d1', 'e2', 'f1', 'f2']);
  });

  it('only the side to move has legal moves through generateLegalMoves', () => {
    const s = position(['Ke1', 'ke8'], { sideToMove: 'w' });
    expect(generateLegalMoves(s, sq('e8'))).toEqual([]);
    expect(hasAnyLegalMove(s, 'b')).toBe(true);
  });

  it('no legal move leaves the mover in check', () => {
    const s = position(['Ke1', 'Rd1', 'Bf1', 'Pe2', 'qa5', 'bb4', 'ke8', 'rh4']);
    for (const m of generateLegalMoves(s)) {
      const next = applyMove(s, m.from, m.to);
      expect(isKingInCheck(next, 'w')).toBe(false);
    }
  });

  it('restores the board after simulating a move', () => {
    const s = position(['Ke1', 'Re2', 're8', 'ka8', 'Pd5*', 'pc5*'], { lastDoublePawnAdvance: sq('c5') });
    const snapshot = s.board.map((p) => (p ? { ...p } : null));
    wouldMoveCauseSelfCheck(s, sq('e2'), sq('a2'));
    wouldMoveCauseSelfCheck(s, sq('d5'), sq('c6'));
    generateLegalMoves(s);
    expect(s.board).toEqual(snapshot);
  });

  describe('castling', () => {
    it('offers king-side castling to g1 with a clear, safe path', () => {
      const s = position(['Ke1', 'Rh1', 'ka8']);
      expect(legalMoves(s, sq('e1')).has(sq('g1'))).toBe(true);
    });

    it('refuses castling across an attacked square', () => {
      const s = position(['Ke1', 'Rh1', 'ka8', 'rf3']);
      const dests = legalMoves(s, sq('e1'));
      expect(dests.has(sq('g1'))).toBe(false);
      expect(dests.has(sq('f1'))).toBe(false);
    });

    it('refuses castling into check', () => {
      const s = position(['Ke1', 'Rh1', 'ka8', 'rg3']);
      expect(legalMoves(s, sq('e1')).has(sq('g1'))).toBe(false);
    });
  });

  describe('en passant', () => {
    it('is legal right after the double push', () => {
      const s = position(['Ke1', 'Pe5*', 'pd5*', 'ke8'], { sideToMove: 'w', lastDoublePawnAdvance: sq('d5') });
      expect(legalMoves(s, sq('e5')).has(sq('d6'))).toBe(true);
    });

    it('is illegal when removing both pawns opens the rank onto the king', () => {
      const s = position(['Ka5', 'Pb5*', 'pc5*', 'rh5', 'ke8'], { lastDoublePawnAdvance: sq('c5') });
      expect(legalMoves(s, sq('b5')).has(sq('c6'))).toBe(false);
      expect(legalMoves(s, sq('b5')).has(sq('b6'))).toBe(true);
    });
  });
});
