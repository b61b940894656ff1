import type { GameState, Square } from './chessTypes';
import { reset, tryMove } from './game';
import { getLogger } from './logger';
import type { OracleMoveResponse } from './ai/oracleMove';
import { applyOracleResponse } from './ai/oracleMove';

/**
 * Keeping the authoritative transition logic in a single reducer makes it easy to:
 * - drive a UI through useReducer
 * - feed the state to an engine
 * - replay games
 *
 * Rejected actions return the same state object, so callers can detect them by identity.
 */

export type GameAction =
  | { type: 'reset' }
  | { type: 'move'; from: Square; to: Square }
  | { type: 'oracleMove'; response: OracleMoveResponse };

export function gameReducer(state: GameState, action: GameAction): GameState {
  switch (action.type) {
    case 'reset':
      return reset(state);
    case 'move': {
      const r = tryMove(state, action.from, action.to);
      if (r.ok) return r.value;
      getLogger().debug(r.error.message);
      return state;
    }
    case 'oracleMove': {
      const r = applyOracleResponse(state, action.response);
      return r.applied ? r.state : state;
    }
    default:
      return state;
  }
}
