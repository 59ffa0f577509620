import { existsSync, readFileSync } from 'node:fs';
import Papa, { type ParseResult } from 'papaparse';
import type { WordEntry, WordLine } from '../types';
import { InvalidConfigurationError } from './error';

function normalizeCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
}

export function makeWordEntry(english: string, chinese: string): WordEntry {
  return Object.freeze({ english, chinese });
}

export interface WordListParseMeta {
  words: WordLine[];
  invalidRows: number;
  /** Raw text of each rejected row, for warnings. */
  rejected: string[];
}

function toWordLine(cells: string[]): WordLine | null {
  if (cells.length === 2) {
    const [english, chinese] = cells;
    return english && chinese ? { entry: makeWordEntry(english, chinese) } : null;
  }
  if (cells.length === 3) {
    const [english, phonetic, chinese] = cells;
    if (!english || !chinese) {
      return null;
    }
    return phonetic ? { entry: makeWordEntry(english, chinese), phonetic } : { entry: makeWordEntry(english, chinese) };
  }
  return null;
}

export function parseWordList(text: string): WordListParseMeta {
  const parsed: ParseResult<string[]> = Papa.parse<string[]>(text.replace(/^\uFEFF/, '').trim(), {
    delimiter: ',',
    // Quotes are plain text: one stray quote must not swallow the lines after it.
    quoteChar: '\u0000',
    skipEmptyLines: 'greedy'
  });

  const words: WordLine[] = [];
  const rejected: string[] = [];

  for (const row of parsed.data) {
    const cells = row.map(normalizeCell);
    const line = toWordLine(cells);
    if (line) {
      words.push(line);
    } else {
      rejected.push(cells.join(','));
    }
  }

  return {
    words,
    invalidRows: rejected.length,
    rejected
  };
}

export function readWordList(filePath: string): WordListParseMeta {
  if (!existsSync(filePath)) {
    throw new InvalidConfigurationError(`Word list file ${filePath} does not exist`);
  }
  return parseWordList(readFileSync(filePath, 'utf8'));
}
