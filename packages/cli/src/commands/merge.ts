/**
 * Merge command implementation
 */

import { CacheStore, DatabaseError, type MergeStats } from '@gobook/database';

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/loader.js';
import { MaintenanceError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Merge a cache database into the configured cache
 *
 * @throws MaintenanceError when either database cannot be opened
 */
export function mergeInto(cachePath: string, sourcePath: string): MergeStats {
  const cache = new CacheStore({ dbPath: cachePath });
  try {
    return cache.mergeDatabase(resolveAbsolutePath(sourcePath));
  } catch (error) {
    if (error instanceof DatabaseError) {
      throw new MaintenanceError(
        `Merge failed: ${error.message}`,
        'Check that the source is a gobook analysis cache database',
      );
    }
    throw error;
  } finally {
    cache.close();
  }
}

/**
 * Main merge command handler
 */
export async function mergeCommand(
  sourceDb: string,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);
    const reporter = new ProgressReporter({ color: !options.noColor });

    const stats = mergeInto(config.databases.cachePath, sourceDb);
    reporter.printSuccess(
      `Merged ${sourceDb}: ${stats.inserted} inserted, ${stats.merged} merged, ${stats.errors} errors`,
    );
    if (stats.errors > 0) {
      reporter.printWarning(`${stats.errors} unreadable source entries were skipped`);
    }
  } catch (error) {
    handleError(error);
  }
}
