/**
 * Local Database Provider
 *
 * Loads JSON files from the db/ directory, validates them against their
 * schema and caches the parsed result per file.
 */

import { readFile } from 'fs/promises';
import { isAbsolute, join } from 'path';
import type { z } from 'zod';
import { ProxyStoreSchema, type ProxyStore } from '../types/proxy.js';
import { logger, errorMessage } from '../utils/logger.js';

const log = logger.createContext('local-db');

const cache = new Map<string, unknown>();

export function resolveDbPath(filename: string): string {
  return isAbsolute(filename) ? filename : join(process.cwd(), 'db', filename);
}

/**
 * Load and validate a JSON file from the db directory
 * @param filename - File name inside db/ (e.g., 'proxies.json') or an absolute path
 */
export async function loadJsonFile<S extends z.ZodTypeAny>(filename: string, schema: S): Promise<z.infer<S>> {
  const filePath = resolveDbPath(filename);

  if (cache.has(filePath)) {
    log.debug(`Returning cached data for ${filename}`);
    return schema.parse(cache.get(filePath));
  }

  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`Failed to load database file ${filename}: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid database file ${filename}: ${result.error.message}`);
  }

  cache.set(filePath, result.data);
  log.debug(`Loaded and cached ${filename}`);
  return result.data;
}

/**
 * Clear the cache for a specific file or all files
 */
export function clearCache(filename?: string): void {
  if (filename) {
    cache.delete(resolveDbPath(filename));
  } else {
    cache.clear();
  }
}

export async function loadProxies(filename = 'proxies.json'): Promise<ProxyStore> {
  return loadJsonFile(filename, ProxyStoreSchema);
}
