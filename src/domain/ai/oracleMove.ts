import type { GameState, MoveIntent } from '../chessTypes';
import { isGameOver } from '../chessTypes';
import { isAbortError, OracleUnavailableError } from '../errors';
import { tryMove } from '../game';
import { generateLegalMoves } from '../legalMoves';
import type { Logger } from '../logger';
import { getLogger } from '../logger';
import { moveToUci } from '../notation/uci';
import type { MoveOracle } from './types';
import type { Rng } from './randomMove';
import { pickRandomLegalMove } from './randomMove';

/**
 * Identifies the position a request was issued against. A reset bumps `generation`,
 * any move bumps `ply`; either makes the answer stale.
 */
export type OracleTicket = {
  generation: number;
  ply: number;
};

export type OracleMoveResponse = {
  ticket: OracleTicket;
  move: MoveIntent;
  source: 'oracle' | 'fallback';
};

export type OracleMoveOptions = {
  timeBudgetMs?: number;
  signal?: AbortSignal;
  rng?: Rng;
  logger?: Logger;
  requestId?: string;
};

export function ticketFor(state: GameState): OracleTicket {
  return { generation: state.generation, ply: state.history.length };
}

export function isStale(state: GameState, ticket: OracleTicket): boolean {
  return state.generation !== ticket.generation || state.history.length !== ticket.ply;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Ask the oracle for a move, trusting nothing it says.
 *
 * A missing oracle, a thrown error, a null answer or an illegal suggestion all count as
 * "oracle unavailable": it is logged and a uniformly random legal move is used instead.
 * Cancellation through `signal` is the one failure that propagates (as an AbortError).
 *
 * Resolves null only when the game is over or the side to move has no legal move.
 */
export async function requestOracleMove(
  state: GameState,
  oracle: MoveOracle | null,
  opts: OracleMoveOptions = {}
): Promise<OracleMoveResponse | null> {
  if (isGameOver(state)) return null;
  const legal = generateLegalMoves(state);
  if (legal.length === 0) return null;

  const logger = opts.logger ?? getLogger();
  const ticket = ticketFor(state);
  const signal = opts.signal ?? new AbortController().signal;

  if (oracle) {
    try {
      const suggestion = await oracle.bestMove(
        { state, timeBudgetMs: opts.timeBudgetMs, requestId: opts.requestId },
        signal
      );
      if (suggestion === null) throw new OracleUnavailableError('Oracle returned no move');

      const match = legal.find((m) => m.from === suggestion.from && m.to === suggestion.to);
      if (!match) {
        throw new OracleUnavailableError(`Oracle suggested illegal move ${moveToUci(suggestion)}`);
      }
      return { ticket, move: { from: match.from, to: match.to }, source: 'oracle' };
    } catch (e) {
      if (signal.aborted || isAbortError(e)) throw e;
      logger.warn(`oracle unavailable, playing a random legal move: ${describe(e)}`);
    }
  }

  const fallback = pickRandomLegalMove(state, opts.rng);
  if (!fallback) return null;
  return { ticket, move: { from: fallback.from, to: fallback.to }, source: 'fallback' };
}

export type ApplyOracleResult =
  | { applied: true; state: GameState }
  | { applied: false; reason: 'stale' | 'illegal' };

/**
 * Apply an oracle answer if, and only if, it still belongs to `state`.
 */
export function applyOracleResponse(
  state: GameState,
  response: OracleMoveResponse,
  logger: Logger = getLogger()
): ApplyOracleResult {
  if (isStale(state, response.ticket)) {
    logger.debug(
      `discarding stale oracle move ${moveToUci(response.move)} ` +
        `(issued g${response.ticket.generation}/ply ${response.ticket.ply}, now g${state.generation}/ply ${state.history.length})`
    );
    return { applied: false, reason: 'stale' };
  }

  const r = tryMove(state, response.move.from, response.move.to);
  if (!r.ok) {
    logger.warn(`oracle move rejected: ${r.error.message}`);
    return { applied: false, reason: 'illegal' };
  }
  return { applied: true, state: r.value };
}
