/**
 * Temporary files for tests that touch the filesystem
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { gzipSync } from 'node:zlib';

/**
 * Create a fresh temporary directory
 */
export function createTempDir(prefix = 'gobook-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Remove a directory created by createTempDir
 */
export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a JSON bundle to disk, gzipped when the name ends in .gz
 */
export function writeJsonFixture(dir: string, fileName: string, content: unknown): string {
  const fullPath = path.join(dir, fileName);
  const json = JSON.stringify(content);
  fs.writeFileSync(fullPath, fileName.endsWith('.gz') ? gzipSync(json) : json);
  return fullPath;
}
