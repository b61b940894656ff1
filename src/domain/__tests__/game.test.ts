import { legalMoves, newGame, reset, status, tryMove } from '../game';
import { IllegalMoveError } from '../errors';
import { toFen } from '../notation/fen';
import { names, position, sq } from './helpers';

describe('game API', () => {
  it('newGame starts in progress with white to move', () => {
    const s = newGame();
    expect(status(s)).toEqual({ kind: 'inProgress' });
    expect(s.sideToMove).toBe('w');
  });

  it('legalMoves lists destinations of the piece on a square', () => {
    const s = newGame();
    expect(names(legalMoves(s, sq('g1')))).toEqual(['f3', 'h3']);
    expect(names(legalMoves(s, sq('e2')))).toEqual(['e3', 'e4']);
    expect(legalMoves(s, sq('e4')).size).toBe(0);
    expect(legalMoves(s, sq('e7')).size).toBe(0);
  });

  it('legalMoves is empty once the game is over', () => {
    const s = position(['Ka8', 'qc7', 'kh1'], { sideToMove: 'w' });
    expect(s.result.kind).toBe('stalemate');
    expect(legalMoves(s, sq('a8')).size).toBe(0);
  });

  it.each([
    ['e4', 'e5', 'emptySquare'],
    ['e7', 'e5', 'wrongSide'],
    ['e2', 'e5', 'illegalDestination']
  ] as const)('rejects %s-%s as %s and keeps the state', (from, to, reason) => {
    const s = newGame();
    const before = toFen(s);
    const r = tryMove(s, sq(from), sq(to));
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error).toBeInstanceOf(IllegalMoveError);
    expect(r.error.reason).toBe(reason);
    expect(r.error.message).toBe(`Illegal move ${from}-${to} (${reason})`);
    expect(toFen(s)).toBe(before);
    expect(s.history).toHaveLength(0);
  });

  it('applies a legal move and recomputes the result', () => {
    const r = tryMove(newGame(), sq('e2'), sq('e4'));
    expect(r.ok).toBe(true);
    if (!r.ok) return;
    expect(toFen(r.value)).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
    expect(status(r.value)).toEqual({ kind: 'inProgress' });
  });

  it('reset starts over with a new generation', () => {
    const r = tryMove(newGame(), sq('d2'), sq('d4'));
    if (!r.ok) throw r.error;
    const fresh = reset(r.value);
    expect(fresh.history).toEqual([]);
    expect(fresh.generation).toBe(1);
    expect(toFen(fresh)).toBe(toFen(newGame()));
    expect(reset(fresh).generation).toBe(2);
  });
});
