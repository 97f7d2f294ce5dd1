/**
 * Clear-cache command implementation
 */

import { createInterface } from 'node:readline/promises';

import { CacheStore } from '@gobook/database';

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { MaintenanceError, handleError } from '../errors/index.js';
import { ProgressReporter } from '../progress/reporter.js';

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Main clear-cache command handler
 */
export async function clearCacheCommand(rawOptions: Record<string, unknown>): Promise<void> {
  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);
    const reporter = new ProgressReporter({ color: !options.noColor });

    const cache = new CacheStore({ dbPath: config.databases.cachePath });
    try {
      const count = cache.count();
      if (count === 0) {
        reporter.printMessage('Cache is already empty');
        return;
      }

      if (rawOptions['yes'] !== true) {
        if (!process.stdin.isTTY) {
          throw new MaintenanceError(
            'Refusing to clear the cache without confirmation',
            'Re-run with --yes',
          );
        }
        if (!(await confirm(`Delete all ${count} cached analyses? [y/N] `))) {
          reporter.printMessage('Aborted');
          return;
        }
      }

      const deleted = cache.clear();
      reporter.printSuccess(`Deleted ${deleted} cached analyses from ${cache.fullPath}`);
    } finally {
      cache.close();
    }
  } catch (error) {
    handleError(error);
  }
}
