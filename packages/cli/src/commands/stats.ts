/**
 * Stats command implementation
 */

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { createOrchestrator } from '../orchestrator/services.js';
import { formatStatsTable } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Print opening book and cache entry counts by board size
 */
export async function statsCommand(rawOptions: Record<string, unknown>): Promise<void> {
  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);
    const reporter = new ProgressReporter({ color: !options.noColor });

    const orchestrator = createOrchestrator(config);
    try {
      await orchestrator.init();
      reporter.printMessage(formatStatsTable(orchestrator.getStats(), reporter.colors));
    } finally {
      await orchestrator.dispose();
    }
  } catch (error) {
    handleError(error);
  }
}
