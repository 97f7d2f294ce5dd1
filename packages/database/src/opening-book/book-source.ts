/**
 * Where an opening book bundle comes from
 */

import * as fs from 'fs';
import { promisify } from 'util';
import * as zlib from 'zlib';

const gunzip = promisify(zlib.gunzip);

/**
 * Bundle on disk (".gz" files are decompressed) or already parsed data
 */
export type BookSource = { kind: 'file'; path: string } | { kind: 'inline'; data: unknown };

/**
 * Human-readable name of a source, for logs and errors
 */
export function describeBookSource(source: BookSource): string {
  return source.kind === 'file' ? source.path : 'inline data';
}

/**
 * Read and parse a bundle.
 * Throws the underlying fs, zlib or JSON error.
 */
export async function readBookSource(source: BookSource): Promise<unknown> {
  if (source.kind === 'inline') {
    return source.data;
  }

  let bytes = await fs.promises.readFile(source.path);
  if (source.path.endsWith('.gz')) {
    bytes = await gunzip(bytes);
  }
  const parsed: unknown = JSON.parse(bytes.toString('utf-8'));
  return parsed;
}
