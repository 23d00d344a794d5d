import { readFile, writeFile } from 'fs/promises';
import { randomInt } from 'crypto';
import { z } from 'zod';
import { loadJsonFile } from '../providers/local-db.js';
import { logger, errorMessage } from './logger.js';

const log = logger.createContext('worker-identity');

const WordListSchema = z.object({
  adjectives: z.array(z.string()).min(1),
  animals: z.array(z.string()).min(1)
});

export type WordList = z.infer<typeof WordListSchema>;

export interface WorkerNameOptions {
  /** Explicit name, wins over everything else */
  name?: string;
  /** File the generated name is kept in between restarts */
  file?: string;
  words?: WordList;
  randomInt?: (max: number) => number;
}

export function generateWorkerName(words: WordList, pick: (max: number) => number = randomInt): string {
  const adjective = words.adjectives[pick(words.adjectives.length)];
  const animal = words.animals[pick(words.animals.length)];
  const suffix = String(pick(10000)).padStart(4, '0');
  return `${adjective}-${animal}-${suffix}`;
}

async function readName(file: string): Promise<string | null> {
  try {
    const stored = (await readFile(file, 'utf-8')).trim();
    return stored || null;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Identity stamped on every published result as `processor`.
 * Resolution order: explicit name, stored name, freshly generated (then stored).
 */
export async function resolveWorkerName(options: WorkerNameOptions = {}): Promise<string> {
  if (options.name?.trim()) {
    return options.name.trim();
  }

  const file = options.file ?? './client_name.txt';
  const stored = await readName(file);
  if (stored) {
    return stored;
  }

  const words = options.words ?? await loadJsonFile('worker-names.json', WordListSchema);
  const name = generateWorkerName(words, options.randomInt);
  try {
    await writeFile(file, name, 'utf-8');
    log.normal(`Generated worker name ${name}`);
  } catch (error) {
    log.error(`Could not persist worker name to ${file}: ${errorMessage(error)}`);
  }
  return name;
}
