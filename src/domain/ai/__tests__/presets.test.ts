import { DEFAULT_ENGINE_PATH, oracleConfigFromDifficulty, oracleConfigFromEnv } from '../presets';

describe('oracle presets', () => {
  it('maps easy/medium/hard to increasing skill', () => {
    const easy = oracleConfigFromDifficulty('easy');
    const medium = oracleConfigFromDifficulty('medium');
    const hard = oracleConfigFromDifficulty('hard');

    expect(easy.skillLevel).toBeLessThan(medium.skillLevel);
    expect(medium.skillLevel).toBeLessThan(hard.skillLevel);
    expect(hard.moveTimeMs).toBeGreaterThanOrEqual(medium.moveTimeMs);
    expect(easy.enginePath).toBe(DEFAULT_ENGINE_PATH);
  });

  it('applies skill and time overrides only for custom difficulty', () => {
    const c = oracleConfigFromDifficulty('custom', { skillLevel: 4, moveTimeMs: 777 });
    expect(c).toMatchObject({ difficulty: 'custom', skillLevel: 4, moveTimeMs: 777 });

    const h = oracleConfigFromDifficulty('hard', { skillLevel: 4, moveTimeMs: 777 });
    expect(h).toMatchObject({ difficulty: 'hard', skillLevel: 18, moveTimeMs: 500 });
  });

  it('always honours the engine path and clamps ranges', () => {
    expect(oracleConfigFromDifficulty('easy', { enginePath: '/opt/engine' }).enginePath).toBe('/opt/engine');
    const c = oracleConfigFromDifficulty('custom', { skillLevel: 99, moveTimeMs: 1, startupTimeoutMs: 5 });
    expect(c).toMatchObject({ skillLevel: 20, moveTimeMs: 10, startupTimeoutMs: 100 });
  });
});

describe('oracleConfigFromEnv', () => {
  it('uses the preset when nothing is set', () => {
    expect(oracleConfigFromEnv({})).toEqual(oracleConfigFromDifficulty('medium'));
    expect(oracleConfigFromEnv({}, 'hard').skillLevel).toBe(18);
  });

  it('turns skill or move time into a custom config', () => {
    const c = oracleConfigFromEnv({ CHESS_ENGINE_SKILL: '5', CHESS_ENGINE_MOVETIME_MS: '250', CHESS_ENGINE_PATH: ' /usr/games/stockfish ' });
    expect(c).toEqual({
      difficulty: 'custom',
      enginePath: '/usr/games/stockfish',
      skillLevel: 5,
      moveTimeMs: 250,
      startupTimeoutMs: 5000
    });
  });

  it('ignores values that are not numbers', () => {
    const c = oracleConfigFromEnv({ CHESS_ENGINE_SKILL: 'strong', CHESS_ENGINE_MOVETIME_MS: '' }, 'easy');
    expect(c).toMatchObject({ difficulty: 'easy', skillLevel: 3, moveTimeMs: 100 });
  });
});
