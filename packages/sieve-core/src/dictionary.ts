// packages/sieve-core/src/dictionary.ts
//
// Newline-delimited word lists on disk.
//
// readDictionary streams raw lines (no trimming; the orchestrator strips
// trailing whitespace), loadDictionary collects them for callers that keep
// the list in memory (the HTTP server loads once at boot).

import { open, stat, type FileHandle } from 'node:fs/promises';
import { DictionaryError } from './errors.js';

/**
 * Stream the lines of a UTF-8 word list.
 *
 * The file is opened on the first next() call, so a missing path fails
 * before any line is yielded.
 *
 * @throws DictionaryError if the path is missing, not a regular file, or a
 *         read fails mid-stream
 */
export async function* readDictionary(path: string): AsyncGenerator<string, void, undefined> {
  const handle = await openWordList(path);
  try {
    for await (const line of handle.readLines({ encoding: 'utf8' })) {
      yield line;
    }
  } catch (err) {
    throw new DictionaryError(path, err);
  } finally {
    await handle.close();
  }
}

async function openWordList(path: string): Promise<FileHandle> {
  try {
    const info = await stat(path);
    if (!info.isFile()) throw new Error('not a regular file');
    return await open(path, 'r');
  } catch (err) {
    throw new DictionaryError(path, err);
  }
}

/** Read every line of a word list into memory, dropping blank lines. */
export async function loadDictionary(path: string): Promise<string[]> {
  const words: string[] = [];
  for await (const line of readDictionary(path)) {
    const word = line.trimEnd();
    if (word) words.push(word);
  }
  return words;
}
