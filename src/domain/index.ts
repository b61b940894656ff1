export type {
  Board,
  Color,
  GameState,
  GameStatus,
  Move,
  MoveIntent,
  Piece,
  PieceType,
  PromotionPiece,
  Square
} from './chessTypes';

export { isGameOver, oppositeColor } from './chessTypes';

export { FILES, colOf, isSquare, makeSquare, parseAlgebraicSquare, rowOf, toAlgebraic } from './square';

export { countPieces, createEmptyBoard, createStartingBoard, getPiece, makePiece, setPiece } from './board';

export type { PiecePlacement, PositionSetup } from './gameState';
export { createGameState, createInitialGameState } from './gameState';

export { generatePseudoLegalMoves } from './movegen';
export { findKing, isKingInCheck, isSquareAttacked } from './attack';
export { generateLegalMoves, wouldMoveCauseSelfCheck } from './legalMoves';
export { applyMove } from './applyMove';
export {
  getGameStatus,
  isCheckmate,
  isFiftyMoveDraw,
  isInsufficientMaterial,
  isStalemate,
  isThreefoldRepetition
} from './gameStatus';

export type { TryMoveResult } from './game';
export { legalMoves, newGame, reset, status, tryMove } from './game';

export type { GameAction } from './reducer';
export { gameReducer } from './reducer';

export type { IllegalMoveReason, MalformedReplay } from './errors';
export { IllegalMoveError, InvariantViolationError, OracleUnavailableError, isAbortError } from './errors';

export type { LogLevel, Logger } from './logger';
export { consoleLogger, getLogger, setLogger, silentLogger } from './logger';

export { moveToUci, parseUciMove } from './notation/uci';
export { positionKey, toFen } from './notation/fen';

export type { ReplayFrame, ReplayOptions, ReplayResult } from './review/replay';
export { getReplayStateAtPly, replayMoves } from './review/replay';

export type { MoveOracle, OracleRequest } from './ai/types';
export type { OracleConfig, OracleConfigOverrides, OracleDifficulty } from './ai/presets';
export { oracleConfigFromDifficulty, oracleConfigFromEnv } from './ai/presets';
export type { Rng } from './ai/randomMove';
export { makeSeededRng, pickRandomLegalMove } from './ai/randomMove';
export type { ApplyOracleResult, OracleMoveOptions, OracleMoveResponse, OracleTicket } from './ai/oracleMove';
export { applyOracleResponse, isStale, requestOracleMove, ticketFor } from './ai/oracleMove';
export type { EngineProcess, SpawnEngine, UciEngineOracleDeps } from './ai/uciEngineOracle';
export { UciEngineOracle, spawnEngineProcess } from './ai/uciEngineOracle';
