import * as fs from 'fs';
import * as path from 'path';
import { gunzipSync } from 'zlib';
import { WordSourceUnavailableError } from './errors';
import { errorMessage, logWithTrace } from './logger';
import type { WordSource } from './types';

/** Prefix that marks a word list bundled with the package rather than a filesystem path. */
export const BUNDLED_PREFIX = '?';

export const BUNDLED_WORD_LIST_DIR = path.join(__dirname, '../resources');

/**
 * Splits list text into lines, dropping line terminators.
 * A trailing newline does not produce an extra empty entry.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function resolveWordListPath(wordListPath: string): string {
  if (wordListPath.startsWith(BUNDLED_PREFIX)) {
    return path.join(BUNDLED_WORD_LIST_DIR, path.basename(wordListPath.slice(BUNDLED_PREFIX.length)));
  }
  return wordListPath;
}

function readWholeFile(filePath: string): Buffer {
  const fd = fs.openSync(filePath, 'r');
  try {
    return fs.readFileSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Reads a word list from disk, one word per line.
 * Paths starting with '?' name a gzip-compressed list under resources/.
 */
export class FileWordSource implements WordSource {
  constructor(readonly wordListPath: string) {}

  get isBundled(): boolean {
    return this.wordListPath.startsWith(BUNDLED_PREFIX);
  }

  readWords(): string[] {
    const filePath = resolveWordListPath(this.wordListPath);

    let words: string[];
    try {
      const raw = readWholeFile(filePath);
      const text = (this.isBundled ? gunzipSync(raw) : raw).toString('utf-8');
      words = splitLines(text);
    } catch (error) {
      logWithTrace('error', 'Error loading word list', {
        wordListPath: this.wordListPath,
        error: errorMessage(error),
      });
      throw new WordSourceUnavailableError(this.wordListPath, error);
    }

    logWithTrace('info', 'Loaded word list', { wordListPath: this.wordListPath, wordCount: words.length });
    return words;
  }
}

export class ArrayWordSource implements WordSource {
  private readonly words: readonly string[];

  constructor(words: Iterable<string>) {
    this.words = [...words];
  }

  readWords(): string[] {
    return [...this.words];
  }
}

export function createWordSource(wordListPath: string): WordSource {
  return new FileWordSource(wordListPath);
}
