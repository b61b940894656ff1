import { useCallback, useEffect, useMemo, useReducer, useRef, useState } from 'react';

import type { Color, GameState, GameStatus, Square } from '../domain/chessTypes';
import { isGameOver } from '../domain/chessTypes';
import { getPiece } from '../domain/board';
import { IllegalMoveError, isAbortError } from '../domain/errors';
import type { TryMoveResult } from '../domain/game';
import { legalMoves, newGame, tryMove } from '../domain/game';
import { getLogger } from '../domain/logger';
import { gameReducer } from '../domain/reducer';
import { requestOracleMove } from '../domain/ai/oracleMove';
import type { Rng } from '../domain/ai/randomMove';
import type { MoveOracle } from '../domain/ai/types';

export type UseChessGameArgs = {
  /** Move supplier for `oracleColor`. Null still plays: every turn falls back to a random legal move. */
  oracle?: MoveOracle | null;
  /** Side the oracle plays. Null or undefined means both sides are human. */
  oracleColor?: Color | null;
  timeBudgetMs?: number;
  rng?: Rng;
};

export type UseChessGameResult = {
  state: GameState;
  status: GameStatus;
  selectedSquare: Square | null;
  /** Legal destinations of the selected piece. */
  highlights: Set<Square>;
  isThinking: boolean;
  lastError: string | null;

  /** Click-style input: select a piece, then a highlighted destination. */
  select: (square: Square) => void;
  move: (from: Square, to: Square) => TryMoveResult;
  reset: () => void;
};

/**
 * Binds a game to React state.
 *
 * - The reducer stays authoritative; oracle answers go through it as `oracleMove` actions.
 * - In-flight oracle requests are aborted when the state moves on or the component unmounts.
 */
export function useChessGame(args: UseChessGameArgs = {}): UseChessGameResult {
  const { oracle = null, oracleColor = null, timeBudgetMs, rng } = args;

  const [state, dispatch] = useReducer(gameReducer, undefined, newGame);
  const [selectedSquare, setSelectedSquare] = useState<Square | null>(null);
  const [isThinking, setIsThinking] = useState(false);
  const [lastError, setLastError] = useState<string | null>(null);

  const stateRef = useRef<GameState>(state);
  stateRef.current = state;

  const oracleTurn = oracleColor !== null && !isGameOver(state) && state.sideToMove === oracleColor;

  const highlights = useMemo(
    () => (selectedSquare === null ? new Set<Square>() : legalMoves(state, selectedSquare)),
    [state, selectedSquare]
  );

  const move = useCallback(
    (from: Square, to: Square): TryMoveResult => {
      const current = stateRef.current;
      // The oracle's pieces are not the user's to move.
      if (oracleColor !== null && current.sideToMove === oracleColor && !isGameOver(current)) {
        return { ok: false, error: new IllegalMoveError(from, to, 'wrongSide') };
      }
      const r = tryMove(current, from, to);
      if (r.ok) {
        stateRef.current = r.value;
        dispatch({ type: 'move', from, to });
        setSelectedSquare(null);
      }
      return r;
    },
    [oracleColor]
  );

  const select = useCallback(
    (square: Square) => {
      const current = stateRef.current;
      if (selectedSquare !== null && selectedSquare !== square && legalMoves(current, selectedSquare).has(square)) {
        move(selectedSquare, square);
        return;
      }
      const piece = getPiece(current.board, square);
      const canPick = piece !== null && piece.color === current.sideToMove && square !== selectedSquare;
      setSelectedSquare(canPick ? square : null);
    },
    [move, selectedSquare]
  );

  const reset = useCallback(() => {
    setSelectedSquare(null);
    setLastError(null);
    dispatch({ type: 'reset' });
  }, []);

  useEffect(() => {
    if (!oracleTurn) return;

    const ac = new AbortController();
    setIsThinking(true);

    void requestOracleMove(state, oracle, { timeBudgetMs, signal: ac.signal, rng })
      .then((response) => {
        if (ac.signal.aborted || !response) return;
        dispatch({ type: 'oracleMove', response });
      })
      .catch((err: unknown) => {
        if (isAbortError(err)) return;
        const msg = err instanceof Error ? err.message : String(err);
        getLogger().error(`oracle turn failed: ${msg}`);
        setLastError(msg);
      })
      .finally(() => {
        if (!ac.signal.aborted) setIsThinking(false);
      });

    return () => {
      ac.abort();
      setIsThinking(false);
    };
  }, [oracle, oracleTurn, rng, state, timeBudgetMs]);

  return {
    state,
    status: state.result,
    selectedSquare,
    highlights,
    isThinking,
    lastError,
    select,
    move,
    reset
  };
}
