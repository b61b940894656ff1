import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import type { MoveIntent } from '../chessTypes';
import { isAbortError, makeAbortError, OracleUnavailableError } from '../errors';
import type { Logger } from '../logger';
import { getLogger } from '../logger';
import { toFen } from '../notation/fen';
import { parseUciMove } from '../notation/uci';
import type { OracleConfig } from './presets';
import type { MoveOracle, OracleRequest } from './types';

/** The parts of a child process the adapter talks to. */
export type EngineProcess = {
  stdin: Writable;
  stdout: Readable;
  onError(listener: (err: Error) => void): void;
  onExit(listener: (code: number | null) => void): void;
  kill(): void;
};

export type SpawnEngine = (enginePath: string) => EngineProcess;

export type UciEngineOracleDeps = {
  spawnEngine?: SpawnEngine;
  logger?: Logger;
};

export const spawnEngineProcess: SpawnEngine = (enginePath) => {
  const child = spawn(enginePath, [], { stdio: ['pipe', 'pipe', 'ignore'] });
  return {
    stdin: child.stdin,
    stdout: child.stdout,
    onError: (listener) => {
      child.on('error', listener);
    },
    onExit: (listener) => {
      child.on('exit', (code) => listener(code));
    },
    kill: () => {
      child.kill();
    }
  };
};

type Waiter = {
  pred: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (err: Error) => void;
};

type WaitOptions = {
  timeoutMs: number;
  label: string;
  signal?: AbortSignal;
  /** Runs when `signal` aborts the wait. */
  onAbort?: () => void;
};

/**
 * Move oracle backed by an external UCI engine process (Stockfish or compatible).
 *
 * One process is started lazily and reused across requests. Any failure to start,
 * an unexpected exit, or a timeout surfaces as OracleUnavailableError; the process
 * is dropped and the next request starts a fresh one. An aborted search is stopped
 * and its late bestmove discarded.
 */
export class UciEngineOracle implements MoveOracle {
  private readonly config: OracleConfig;
  private readonly spawnEngine: SpawnEngine;
  private readonly logger: Logger;

  private proc: EngineProcess | null = null;
  private reader: Interface | null = null;
  private buffered: string[] = [];
  private waiters: Waiter[] = [];
  private initPromise: Promise<void> | null = null;
  private failure: Error | null = null;
  /** bestmove lines still owed by searches we stopped; dropped on arrival. */
  private abandonedSearches = 0;

  constructor(config: OracleConfig, deps: UciEngineOracleDeps = {}) {
    this.config = config;
    this.spawnEngine = deps.spawnEngine ?? spawnEngineProcess;
    this.logger = deps.logger ?? getLogger();
  }

  init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.handshake().catch((e: unknown) => {
        this.shutdown();
        throw e;
      });
    }
    return this.initPromise;
  }

  async bestMove(request: OracleRequest, signal: AbortSignal): Promise<MoveIntent | null> {
    if (signal.aborted) throw makeAbortError();
    await this.init();
    if (signal.aborted) throw makeAbortError();

    const moveTimeMs = Math.max(10, Math.round(request.timeBudgetMs ?? this.config.moveTimeMs));
    const timeoutMs = Math.max(2_000, moveTimeMs * 20);

    // Earlier chatter (id, info lines) is of no further use.
    this.buffered = [];
    this.send(`position fen ${toFen(request.state)}`);
    this.send(`go movetime ${moveTimeMs}`);

    let line: string;
    try {
      line = await this.waitForLine((l) => l.startsWith('bestmove'), {
        timeoutMs,
        label: 'bestmove',
        signal,
        onAbort: () => {
          this.abandonedSearches += 1;
          this.send('stop');
        }
      });
    } catch (e) {
      // A search that never answers leaves the engine unusable.
      if (!isAbortError(e) && this.proc) {
        this.logger.warn(`restarting engine: ${e instanceof Error ? e.message : String(e)}`);
        this.shutdown();
      }
      throw e;
    }

    const token = line.trim().split(/\s+/)[1];
    if (!token || token === '(none)') return null;

    const parsed = parseUciMove(token);
    if (!parsed) {
      throw new OracleUnavailableError(`Engine sent unparseable move "${token}"`);
    }
    this.logger.debug(`engine suggests ${token}${request.requestId ? ` (${request.requestId})` : ''}`);
    return parsed;
  }

  async dispose(): Promise<void> {
    if (this.proc) this.send('quit');
    this.shutdown();
  }

  private async handshake(): Promise<void> {
    this.start();
    const timeoutMs = this.config.startupTimeoutMs;

    this.send('uci');
    await this.waitForLine((l) => l === 'uciok', { timeoutMs, label: 'uciok' });

    this.send(`setoption name Skill Level value ${this.config.skillLevel}`);
    this.send('isready');
    await this.waitForLine((l) => l === 'readyok', { timeoutMs, label: 'readyok' });

    this.logger.info(`engine ready: ${this.config.enginePath} (skill ${this.config.skillLevel})`);
  }

  private start(): void {
    const enginePath = this.config.enginePath;
    this.failure = null;
    this.buffered = [];
    this.abandonedSearches = 0;

    const proc = this.spawnEngine(enginePath);
    this.proc = proc;

    proc.onError((err) => {
      this.fail(proc, new OracleUnavailableError(`Engine ${enginePath} failed: ${err.message}`, { cause: err }));
    });
    proc.onExit((code) => {
      this.fail(proc, new OracleUnavailableError(`Engine ${enginePath} exited (code ${code ?? 'none'})`));
    });
    // Writes after the process died surface here (EPIPE) instead of as an unhandled error.
    proc.stdin.on('error', (err: Error) => {
      this.fail(proc, new OracleUnavailableError(`Engine ${enginePath} stdin closed: ${err.message}`, { cause: err }));
    });

    const reader = createInterface({ input: proc.stdout, crlfDelay: Infinity });
    reader.on('line', (raw: string) => this.onLine(raw));
    this.reader = reader;
  }

  private onLine(raw: string): void {
    const line = raw.trim();
    if (!line) return;

    if (line.startsWith('bestmove') && this.abandonedSearches > 0) {
      this.abandonedSearches -= 1;
      return;
    }

    const i = this.waiters.findIndex((w) => w.pred(line));
    if (i >= 0) {
      const [w] = this.waiters.splice(i, 1);
      w.resolve(line);
      return;
    }
    this.buffered.push(line);
  }

  private send(command: string): void {
    const proc = this.proc;
    if (!proc || this.failure) return;
    proc.stdin.write(`${command}\n`);
  }

  private waitForLine(pred: (line: string) => boolean, opts: WaitOptions): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }

      const idx = this.buffered.findIndex(pred);
      if (idx >= 0) {
        const [line] = this.buffered.splice(idx, 1);
        resolve(line);
        return;
      }

      const signal = opts.signal;
      const settle = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters = this.waiters.filter((w) => w !== waiter);
      };
      const waiter: Waiter = {
        pred,
        resolve: (line) => {
          settle();
          resolve(line);
        },
        reject: (err) => {
          settle();
          reject(err);
        }
      };
      const timer = setTimeout(() => {
        settle();
        reject(new OracleUnavailableError(`Engine timeout waiting for ${opts.label} after ${opts.timeoutMs}ms`));
      }, opts.timeoutMs);
      const onAbort = (): void => {
        settle();
        opts.onAbort?.();
        reject(makeAbortError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private fail(proc: EngineProcess, err: Error): void {
    if (proc !== this.proc || this.failure) return;
    this.logger.warn(err.message);
    this.failure = err;
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) w.reject(err);
    this.shutdown();
  }

  private shutdown(): void {
    const proc = this.proc;
    this.proc = null;
    this.initPromise = null;
    this.reader?.close();
    this.reader = null;
    this.buffered = [];
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) w.reject(new OracleUnavailableError('Engine was shut down'));
    if (proc) proc.kill();
  }
}
