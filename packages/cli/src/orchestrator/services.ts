/**
 * Service initialization and health checking
 */

import * as fs from 'node:fs';

import { CacheStore, OpeningBookIndex } from '@gobook/database';
import { GtpEngine, type AnalysisEngine } from '@gobook/engine';

import type { GobookConfig } from '../config/schema.js';
import { resolveAbsolutePath } from '../errors/index.js';
import type { ServiceStatus } from '../progress/types.js';

import { FallbackOrchestrator } from './orchestrator.js';

/**
 * Initialized services container
 */
export interface Services {
  book: OpeningBookIndex;
  cache: CacheStore;
  engine: AnalysisEngine | null;
}

function checkFile(name: string, filePath: string): ServiceStatus {
  const absolutePath = resolveAbsolutePath(filePath);
  if (fs.existsSync(absolutePath)) {
    return { name, healthy: true };
  }
  return { name, healthy: false, error: `file not found: ${absolutePath}` };
}

/**
 * Check the cache database can be opened (it is created when missing)
 */
function checkCache(config: GobookConfig): ServiceStatus {
  const name = 'Analysis cache';
  const store = new CacheStore({ dbPath: config.databases.cachePath });
  const startTime = Date.now();
  try {
    store.open();
    return { name, healthy: true, latencyMs: Date.now() - startTime };
  } catch (error) {
    return {
      name,
      healthy: false,
      error: error instanceof Error ? error.message : 'open failed',
    };
  } finally {
    store.close();
  }
}

/**
 * Perform all health checks
 */
export function performHealthChecks(config: GobookConfig): ServiceStatus[] {
  const results: ServiceStatus[] = [];

  if (config.openingBook.enabled) {
    results.push(checkFile('Opening book', config.databases.openingBookPath));
  }

  results.push(checkCache(config));

  // Engine files are only needed when the engine may run
  if (config.engine.enabled) {
    results.push(checkFile('KataGo model', config.engine.modelPath));
    results.push(checkFile('KataGo config', config.engine.configPath));
  }

  return results;
}

/**
 * Build the services described by config. Nothing is opened or started.
 */
export function createServices(config: GobookConfig): Services {
  const { openingBook, engine } = config;

  const book = new OpeningBookIndex({
    syntheticFallback: openingBook.syntheticFallback,
    firstMoves: openingBook.firstMoves,
    syntheticVisits: openingBook.syntheticVisits,
    openingAlternatives: openingBook.openingAlternatives,
  });

  const cache = new CacheStore({ dbPath: config.databases.cachePath });

  const gtp = engine.enabled
    ? new GtpEngine({
        command: engine.command,
        modelPath: engine.modelPath,
        configPath: engine.configPath,
        maxTimeMs: engine.maxTimeMs,
        reportIntervalCs: engine.reportIntervalCs,
      })
    : null;

  return { book, cache, engine: gtp };
}

/**
 * Create an orchestrator over services, wired from config
 */
export function createOrchestrator(
  config: GobookConfig,
  services: Services = createServices(config),
): FallbackOrchestrator {
  return new FallbackOrchestrator(services, {
    topMovesCount: config.analysis.topMovesCount,
    engineTimeoutMs: config.analysis.engineTimeoutMs,
    engineEnabled: config.engine.enabled,
    bookEnabled: config.openingBook.enabled,
    bookSource: { kind: 'file', path: resolveAbsolutePath(config.databases.openingBookPath) },
  });
}
