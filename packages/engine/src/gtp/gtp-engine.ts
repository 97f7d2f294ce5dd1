/**
 * GTP engine backend
 *
 * Runs a KataGo process in GTP mode and analyzes positions with
 * kata-analyze. Commands are written immediately and answered in order,
 * so pending commands form a FIFO; whole analyses are serialized so
 * position setup never interleaves.
 */

import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';

import { formatVertex, type Position } from '@gobook/core';
import type {
  CancellationHandle,
  EngineAnalysis,
  MoveCandidate,
  ProgressListener,
} from '@gobook/types';

import {
  AnalysisCancelledError,
  EngineCommandError,
  EngineProcessError,
  EngineStartupError,
} from '../errors.js';
import type { AnalysisEngine, AnalysisTask } from '../types.js';

import { parseKataAnalyzeLine, totalVisits } from './kata-analyze-parser.js';

/**
 * The parts of a child process the engine talks to
 */
export interface EngineProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/**
 * Starts the engine process
 */
export type SpawnFunction = (command: string, args: string[]) => EngineProcess;

/**
 * Configuration for the GTP engine
 */
export interface GtpEngineConfig {
  /** Engine executable */
  command: string;
  /** Neural network model file */
  modelPath: string;
  /** Engine configuration file */
  configPath: string;
  /** Extra arguments appended after the standard ones */
  extraArgs?: string[];
  /** Engine-side time limit per analysis; the result is partial when it runs out */
  maxTimeMs?: number;
  /** kata-analyze report interval in centiseconds */
  reportIntervalCs?: number;
  /** Time allowed for the engine to load and answer its first command */
  startupTimeoutMs?: number;
  /** Time allowed between quit and a forced kill */
  shutdownGraceMs?: number;
  /** Overrides the label read from the engine's name and version */
  modelLabel?: string;
  /** Process factory, replaced in tests */
  spawn?: SpawnFunction;
}

interface PendingCommand {
  command: string;
  lines: string[];
  onLine?: (line: string) => void;
  resolve: (response: string) => void;
  reject: (error: Error) => void;
}

type AnalysisOutcome = 'complete' | 'partial' | 'cancelled';

interface AnalysisState {
  outcome: AnalysisOutcome | null;
  stopping: Promise<void> | null;
  stopError: unknown;
  latest: MoveCandidate[];
}

interface ActiveAnalysis {
  id: number;
  finish: (outcome: AnalysisOutcome) => void;
}

const defaultSpawn: SpawnFunction = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'ignore'] });

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * KataGo analysis over GTP
 *
 * @example
 * const engine = new GtpEngine({ command: 'katago', modelPath: 'model.bin.gz', configPath: 'gtp.cfg' });
 * if (await engine.start()) {
 *   const task = engine.requestAnalysis(position, 500);
 *   const analysis = await task.result;
 * }
 */
export class GtpEngine implements AnalysisEngine {
  private readonly command: string;
  private readonly args: string[];
  private readonly maxTimeMs: number;
  private readonly reportIntervalCs: number;
  private readonly startupTimeoutMs: number;
  private readonly shutdownGraceMs: number;
  private readonly configuredLabel: string | undefined;
  private readonly spawnProcess: SpawnFunction;

  private process: EngineProcess | null = null;
  private stdin: Writable | null = null;
  private lines: Interface | null = null;
  private pending: PendingCommand[] = [];
  private startPromise: Promise<boolean> | null = null;
  private startupError: Error | null = null;
  private modelLabel = 'KataGo';

  private queue: Promise<void> = Promise.resolve();
  private nextHandleId = 1;
  private readonly waiting = new Set<number>();
  private readonly cancelled = new Set<number>();
  private active: ActiveAnalysis | null = null;

  constructor(config: GtpEngineConfig) {
    this.command = config.command;
    this.args = [
      'gtp',
      '-model',
      config.modelPath,
      '-config',
      config.configPath,
      ...(config.extraArgs ?? []),
    ];
    this.maxTimeMs = config.maxTimeMs ?? 60000;
    this.reportIntervalCs = config.reportIntervalCs ?? 10;
    this.startupTimeoutMs = config.startupTimeoutMs ?? 60000;
    this.shutdownGraceMs = config.shutdownGraceMs ?? 5000;
    this.configuredLabel = config.modelLabel;
    this.spawnProcess = config.spawn ?? defaultSpawn;
  }

  get name(): string {
    return this.modelLabel;
  }

  get isRunning(): boolean {
    return this.process !== null;
  }

  /**
   * Error from the last failed start, if any
   */
  get lastStartupError(): Error | null {
    return this.startupError;
  }

  async start(): Promise<boolean> {
    if (this.process && !this.startPromise) {
      return true;
    }

    // Prevent multiple simultaneous launches
    if (!this.startPromise) {
      this.startPromise = this.launch().then(
        () => {
          this.startupError = null;
          return true;
        },
        (err: unknown) => {
          this.startupError =
            err instanceof Error ? err : new EngineStartupError(this.command, String(err));
          console.warn(`[GtpEngine] ${this.startupError.message}`);
          this.teardown(true);
          return false;
        },
      );
    }

    try {
      return await this.startPromise;
    } finally {
      this.startPromise = null;
    }
  }

  async stop(): Promise<void> {
    const child = this.process;
    if (!child) {
      return;
    }

    this.active?.finish('cancelled');

    const exited = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.shutdownGraceMs);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve(true);
      });
    });
    this.stdin?.write('quit\n');

    if (!(await exited)) {
      console.warn(`[GtpEngine] Engine did not quit within ${this.shutdownGraceMs}ms, killing it`);
      child.kill();
    }
    this.handleProcessFailure(new EngineProcessError('Engine stopped'));
  }

  requestAnalysis(
    position: Position,
    maxVisits: number,
    onProgress?: ProgressListener,
  ): AnalysisTask {
    const handle: CancellationHandle = { id: this.nextHandleId++ };
    this.waiting.add(handle.id);

    const result = this.queue.then(() => this.runAnalysis(handle, position, maxVisits, onProgress));
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return { handle, result };
  }

  cancel(handle: CancellationHandle): void {
    if (this.active?.id === handle.id) {
      this.active.finish('cancelled');
    } else if (this.waiting.has(handle.id)) {
      this.cancelled.add(handle.id);
    }
  }

  /**
   * Spawn the process and read its name and version
   */
  private async launch(): Promise<void> {
    let child: EngineProcess;
    try {
      child = this.spawnProcess(this.command, this.args);
    } catch (err) {
      throw new EngineStartupError(this.command, errorMessage(err));
    }

    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill();
      throw new EngineStartupError(this.command, 'process has no stdio pipes');
    }

    this.process = child;
    this.stdin = stdin;
    this.lines = createInterface({ input: stdout });
    this.lines.on('line', (line: string) => this.handleLine(line));

    child.on('error', (err: Error) => {
      this.handleProcessFailure(new EngineStartupError(this.command, err.message), child);
    });
    child.on('exit', (code: number | null, signal: string | null) => {
      this.handleProcessFailure(
        new EngineProcessError(`Engine process exited (${signal ?? `code ${code ?? 'unknown'}`})`),
        child,
      );
    });
    stdin.on('error', (err: Error) => {
      this.handleProcessFailure(new EngineProcessError(`Engine pipe failed: ${err.message}`), child);
    });

    const handshake = async (): Promise<string> => {
      const name = await this.sendCommand('name');
      const version = await this.sendCommand('version');
      return [name, version].filter((part) => part.length > 0).join(' ');
    };
    const label = await withTimeout(
      handshake(),
      this.startupTimeoutMs,
      () => new EngineStartupError(this.command, `no response within ${this.startupTimeoutMs}ms`),
    );
    this.modelLabel = this.configuredLabel ?? (label || 'KataGo');
  }

  private async runAnalysis(
    handle: CancellationHandle,
    position: Position,
    maxVisits: number,
    onProgress?: ProgressListener,
  ): Promise<EngineAnalysis> {
    // The handle stays in `waiting` until the analysis is active, so a
    // cancel() during start-up is recorded rather than dropped
    try {
      if (this.cancelled.has(handle.id)) {
        throw new AnalysisCancelledError(handle.id);
      }
      const started = await this.start();
      if (this.cancelled.has(handle.id)) {
        throw new AnalysisCancelledError(handle.id);
      }
      if (!started) {
        throw this.startupError ?? new EngineStartupError(this.command, 'engine is not available');
      }
    } finally {
      this.waiting.delete(handle.id);
      this.cancelled.delete(handle.id);
    }

    const startedAt = Date.now();
    const state: AnalysisState = { outcome: null, stopping: null, stopError: null, latest: [] };
    let timer: NodeJS.Timeout | undefined;

    const finish = (outcome: AnalysisOutcome): void => {
      if (state.outcome) return;
      state.outcome = outcome;
      clearTimeout(timer);
      // Any input line ends kata-analyze
      state.stopping = this.sendCommand('protocol_version').then(
        () => undefined,
        (err: unknown) => {
          state.stopError = err;
        },
      );
    };
    this.active = { id: handle.id, finish };

    try {
      await this.setupPosition(position);
      if (state.outcome === null) {
        timer = setTimeout(() => finish('partial'), this.maxTimeMs);
        await this.sendCommand(
          `kata-analyze ${position.nextPlayer} interval ${this.reportIntervalCs}`,
          (line) => {
            if (state.outcome || !line.startsWith('info')) return;
            const candidates = parseKataAnalyzeLine(line);
            const best = candidates[0];
            if (!best) return;

            state.latest = candidates;
            const visits = totalVisits(candidates);
            onProgress?.({
              visits,
              winProbability: best.winProbability,
              scoreLead: best.scoreLead,
              bestMove: best.move,
            });
            if (visits >= maxVisits) {
              finish('complete');
            }
          },
        );
      }
      await state.stopping;
    } catch (err) {
      if (state.outcome === 'cancelled') {
        throw new AnalysisCancelledError(handle.id);
      }
      throw err;
    } finally {
      clearTimeout(timer);
      this.active = null;
    }

    if (state.outcome === 'cancelled') {
      throw new AnalysisCancelledError(handle.id);
    }
    if (state.stopError) {
      throw state.stopError;
    }
    if (state.latest.length === 0) {
      throw new EngineCommandError('kata-analyze', 'no analysis was reported');
    }

    return {
      topMoves: state.latest,
      visits: totalVisits(state.latest),
      completeness: state.outcome === 'complete' ? 'complete' : 'partial',
      durationSeconds: (Date.now() - startedAt) / 1000,
      modelLabel: this.modelLabel,
    };
  }

  private async setupPosition(position: Position): Promise<void> {
    await this.sendCommand(`boardsize ${position.boardSize}`);
    await this.sendCommand('clear_board');
    await this.sendCommand(`komi ${position.komi}`);
    for (const move of position.sequence) {
      await this.sendCommand(`play ${move.color} ${formatVertex(move.coordinate)}`);
    }
  }

  /**
   * Write a command and wait for its response.
   * Lines after the status line go to onLine instead of the response.
   */
  private sendCommand(command: string, onLine?: (line: string) => void): Promise<string> {
    const stdin = this.stdin;
    if (!stdin) {
      return Promise.reject(new EngineProcessError('Engine process is not running'));
    }
    return new Promise<string>((resolve, reject) => {
      this.pending.push({ command, lines: [], onLine, resolve, reject });
      stdin.write(`${command}\n`);
    });
  }

  private handleLine(raw: string): void {
    const line = raw.replace(/\r$/, '');
    const current = this.pending[0];
    if (!current) {
      // Unsolicited output (e.g. the answer to quit)
      return;
    }

    if (line.trim() === '') {
      if (current.lines.length === 0) return;
      this.pending.shift();
      this.settle(current);
      return;
    }

    if (current.lines.length > 0 && current.onLine) {
      current.onLine(line);
    } else {
      current.lines.push(line);
    }
  }

  private settle(command: PendingCommand): void {
    const [status = '', ...rest] = command.lines;
    const body = [status.slice(1), ...rest].join('\n').trim();
    if (status.startsWith('?')) {
      command.reject(new EngineCommandError(command.command, body));
    } else {
      command.resolve(body);
    }
  }

  private handleProcessFailure(error: Error, source?: EngineProcess): void {
    // Late events from a process that was already replaced
    if (source && source !== this.process) {
      return;
    }
    const pending = this.pending.splice(0);
    for (const command of pending) {
      command.reject(error);
    }
    this.teardown(false);
  }

  private teardown(kill: boolean): void {
    if (kill) {
      this.process?.kill();
    }
    this.lines?.close();
    this.lines = null;
    this.stdin = null;
    this.process = null;
  }
}
