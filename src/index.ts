export * from './domain';
export type { UseChessGameArgs, UseChessGameResult } from './hooks/useChessGame';
export { useChessGame } from './hooks/useChessGame';
