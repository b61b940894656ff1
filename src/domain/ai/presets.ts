/**
 * Engine configuration: difficulty presets plus environment overrides.
 *
 * Keep these values reasonably stable and treat them as "defaults".
 */

export type OracleDifficulty = 'easy' | 'medium' | 'hard' | 'custom';

export type OracleConfig = {
  difficulty: OracleDifficulty;
  /** Executable of a UCI engine; resolved through PATH when not absolute. */
  enginePath: string;
  /** UCI "Skill Level", 0..20. */
  skillLevel: number;
  /** Budget passed as `go movetime`. */
  moveTimeMs: number;
  /** How long the uci/isready handshake may take before the engine counts as unavailable. */
  startupTimeoutMs: number;
};

export type OracleConfigOverrides = Partial<Pick<OracleConfig, 'enginePath' | 'skillLevel' | 'moveTimeMs' | 'startupTimeoutMs'>>;

export const DEFAULT_ENGINE_PATH = 'stockfish';

export function oracleConfigFromDifficulty(
  difficulty: OracleDifficulty,
  overrides?: OracleConfigOverrides
): OracleConfig {
  const shared = { enginePath: DEFAULT_ENGINE_PATH, startupTimeoutMs: 5_000 };
  const base: OracleConfig =
    difficulty === 'easy'
      ? { difficulty, ...shared, skillLevel: 3, moveTimeMs: 100 }
      : difficulty === 'medium'
        ? { difficulty, ...shared, skillLevel: 10, moveTimeMs: 100 }
        : difficulty === 'hard'
          ? { difficulty, ...shared, skillLevel: 18, moveTimeMs: 500 }
          : { difficulty, ...shared, skillLevel: 10, moveTimeMs: 100 };

  if (!overrides) return base;

  // Skill and time only move for Custom (to preserve the meaning of presets);
  // where the engine lives is never part of a preset.
  const next: OracleConfig = {
    ...base,
    enginePath: overrides.enginePath ?? base.enginePath,
    startupTimeoutMs: clampInt(overrides.startupTimeoutMs ?? base.startupTimeoutMs, 100, 60_000)
  };
  if (difficulty !== 'custom') return next;

  return {
    ...next,
    skillLevel: clampInt(overrides.skillLevel ?? base.skillLevel, 0, 20),
    moveTimeMs: clampInt(overrides.moveTimeMs ?? base.moveTimeMs, 10, 10_000)
  };
}

/**
 * Reads CHESS_ENGINE_PATH, CHESS_ENGINE_SKILL and CHESS_ENGINE_MOVETIME_MS.
 * Setting skill or move time turns the preset into Custom.
 */
export function oracleConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  difficulty: OracleDifficulty = 'medium'
): OracleConfig {
  const skillLevel = parseNumber(env.CHESS_ENGINE_SKILL);
  const moveTimeMs = parseNumber(env.CHESS_ENGINE_MOVETIME_MS);
  const enginePath = env.CHESS_ENGINE_PATH?.trim() || undefined;

  const tuned = skillLevel !== undefined || moveTimeMs !== undefined;
  return oracleConfigFromDifficulty(tuned ? 'custom' : difficulty, { enginePath, skillLevel, moveTimeMs });
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function clampInt(v: number, min: number, max: number): number {
  const n = Math.round(v);
  return Math.min(max, Math.max(min, n));
}
