/**
 * Analyze command implementation
 */

import { isBoardSize, type PositionInput } from '@gobook/core';

import { parseCliOptions, VERSION } from '../cli.js';
import { computeEffortFor } from '../config/defaults.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import type { CliOptions, GobookConfig } from '../config/schema.js';
import { InputError, handleError } from '../errors/index.js';
import { AnalysisFailedError } from '../orchestrator/errors.js';
import { createOrchestrator, performHealthChecks } from '../orchestrator/services.js';
import {
  createColorFns,
  formatConfigDisplay,
  formatResultJson,
  formatResultTable,
} from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

const DEFAULT_BOARD_SIZE = 19;

/**
 * Build the position request from CLI options.
 * Komi falls back to the configured default unless handicap stones are placed.
 */
export function buildRequest(options: CliOptions, config: GobookConfig): PositionInput {
  const request: PositionInput = { boardSize: options.size ?? DEFAULT_BOARD_SIZE };
  if (options.moves !== undefined) {
    request.moves = options.moves;
  }
  if (options.handicap !== undefined) {
    request.handicap = options.handicap;
  }
  if (options.komi !== undefined) {
    request.komi = options.komi;
  } else if (!options.handicap) {
    request.komi = config.analysis.defaultKomi;
  }
  return request;
}

/**
 * Engine visits for this request: --visits, or the configured visits for the board size
 */
export function resolveComputeEffort(options: CliOptions, config: GobookConfig): number {
  const boardSize = options.size ?? DEFAULT_BOARD_SIZE;
  if (!isBoardSize(boardSize)) {
    throw new InputError(`Unsupported board size: ${boardSize}`, 'Use 9, 13 or 19');
  }
  return options.visits ?? computeEffortFor(config.analysis, boardSize);
}

/**
 * Main analyze command handler
 */
export async function analyzeCommand(rawOptions: Record<string, unknown>): Promise<void> {
  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);
    const useColor = !options.noColor;

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config, createColorFns(useColor)));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const json = config.output.format === 'json';
    // stdout carries only the JSON document in json mode
    const reporter = new ProgressReporter({ color: useColor, silent: json });

    const request = buildRequest(options, config);
    const computeEffort = resolveComputeEffort(options, config);

    reporter.printHeader(VERSION);
    reporter.reportServiceStatus(performHealthChecks(config));

    const orchestrator = createOrchestrator(config);
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once('SIGINT', onSigint);

    try {
      await orchestrator.init();
      reporter.startLookup();
      const result = await orchestrator.analyze(
        request,
        config.analysis.lookupVisits,
        computeEffort,
        {
          signal: controller.signal,
          onProgress: (progress) => reporter.updateEngineProgress(progress),
          onStateChange: (state) => reporter.enterState(state),
          forceRefresh: options.refresh === true,
        },
      );
      reporter.completeLookup(result);

      if (json) {
        process.stdout.write(`${formatResultJson(result)}\n`);
      } else {
        reporter.printMessage('');
        reporter.printMessage(formatResultTable(result, reporter.colors));
      }
    } catch (error) {
      if (error instanceof AnalysisFailedError) {
        reporter.failLookup(error.message);
      } else {
        reporter.stop();
      }
      throw error;
    } finally {
      process.removeListener('SIGINT', onSigint);
      await orchestrator.dispose();
    }
  } catch (error) {
    handleError(error);
  }
}
