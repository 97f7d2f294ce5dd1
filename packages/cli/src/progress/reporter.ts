/**
 * Progress reporter with ora spinners
 */

import type { AnalysisResult, EngineProgress } from '@gobook/types';
import ora, { type Ora, type Color } from 'ora';

import type { LookupState } from '../orchestrator/state-machine.js';

import { createColorFns, formatDuration, formatWinProbability, SOURCE_NAMES } from './formatters.js';
import {
  type ColorFunctions,
  type ProgressReporterOptions,
  type ServiceStatus,
  PHASE_NAMES,
} from './types.js';

export type { ServiceStatus, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Color functions matching the color setting
   */
  get colors(): ColorFunctions {
    return this.c;
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`gobook v${version}`));
    console.log('');
  }

  /**
   * Report service health check results
   */
  reportServiceStatus(services: ServiceStatus[]): void {
    if (this.silent) return;

    console.log(this.c.dim('Checking services...'));
    for (const service of services) {
      const status = service.healthy ? this.c.green('✓') : this.c.yellow('⚠');
      const latency =
        service.latencyMs !== undefined ? this.c.dim(` - ${service.latencyMs}ms`) : '';
      const error = service.error ? this.c.yellow(` (${service.error})`) : '';

      console.log(`  ${status} ${service.name}${latency}${error}`);
    }
    console.log('');
  }

  /**
   * Start timing one lookup
   */
  startLookup(): void {
    this.startTime = Date.now();
  }

  /**
   * Show the lookup state. Terminal states are shown by
   * completeLookup() and failLookup().
   */
  enterState(state: LookupState): void {
    if (this.silent || state === 'done' || state === 'failed') return;

    const text = PHASE_NAMES[state];
    if (this.spinner) {
      this.spinner.text = text;
      return;
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Show live engine progress
   */
  updateEngineProgress(progress: EngineProgress): void {
    if (this.silent || !this.spinner) return;

    const best = progress.bestMove
      ? ` best ${this.c.cyan(progress.bestMove)} (${formatWinProbability(progress.winProbability)})`
      : '';
    this.spinner.text = `${PHASE_NAMES.invoking_engine}... ${progress.visits} visits${best}`;
  }

  /**
   * Complete a lookup successfully
   */
  completeLookup(result: AnalysisResult): void {
    if (this.silent) return;

    const elapsed = Date.now() - this.startTime;
    const message = `Answered by ${SOURCE_NAMES[result.sourceLabel]}${this.c.dim(` (${formatDuration(elapsed)})`)}`;
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      console.log(` ${this.c.green('✓')} ${message}`);
    }
  }

  /**
   * Fail a lookup
   */
  failLookup(error: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.fail(`${PHASE_NAMES.failed}: ${error}`);
      this.spinner = null;
    } else {
      console.log(` ${this.c.red('✗')} ${PHASE_NAMES.failed}: ${error}`);
    }
  }

  /**
   * Print a message (respects color and silent settings)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print an error message
   */
  printError(message: string): void {
    if (this.silent) return;
    console.log(this.c.red(`✗ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Check if colors are enabled
   */
  hasColors(): boolean {
    return this.useColor;
  }
}
