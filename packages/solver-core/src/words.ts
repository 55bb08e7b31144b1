// packages/solver-core/src/words.ts
//
// Bundled word list.
//
// The list lives in data/words.json beside this package and is read once at
// module load. It serves two purposes:
//   • the keeper picks its secret words from it
//   • the dictionary similarity oracle searches it
//
// Other lists (WORDS_FILE on the server) go through the same loader.

import fs from 'node:fs';
import { z } from 'zod';

const wordListSchema = z.array(
  z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z]+$/, 'words must be plain letters a–z'),
);

export const DEFAULT_WORDS_FILE = new URL('../data/words.json', import.meta.url);

/** Reads a JSON array of words; duplicates are dropped, order kept. */
export function loadWordList(file: string | URL = DEFAULT_WORDS_FILE): string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return [...new Set(wordListSchema.parse(raw))];
}

export const WORDS: readonly string[] = loadWordList();
