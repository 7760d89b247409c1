import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import Papa from 'papaparse';
import { z } from 'zod';
import type { ItemSource } from '@unitbatch/core';
import { ConfigError } from '@unitbatch/core';
import type { RawCard } from '../../domain/model/Card.js';
import { cardRowSchema, toRawCard } from '../../domain/model/Card.js';
import { CardFileError } from '../../domain/errors.js';

export interface CardCsvSourceOptions {
  /** Read at most this many cards (a positive integer). Useful for trial runs. */
  readonly limit?: number;
  /** Column delimiter. Default: `','`. */
  readonly delimiter?: string;
}

/** Reads `Front`, `Back`, `deck_name` rows from a deck CSV using PapaParse. */
export class CardCsvSource implements ItemSource<RawCard> {
  constructor(
    private readonly filePath: string,
    private readonly options: CardCsvSourceOptions = {},
  ) {
    assertCardLimit(options.limit);
  }

  async load(): Promise<readonly RawCard[]> {
    const content = await readFile(this.filePath, 'utf-8');
    return parseCards(content, basename(this.filePath), this.options);
  }
}

const cardLimitSchema = z.number().int().positive().optional();

/** @throws ConfigError unless `limit` is absent or a positive integer. */
export function assertCardLimit(limit: number | undefined): void {
  if (!cardLimitSchema.safeParse(limit).success) {
    throw new ConfigError(`Card limit must be a positive integer, got ${String(limit)}`);
  }
}

/** Parse deck CSV text. Rows are numbered from 1, header excluded, in error messages. */
export function parseCards(content: string, fileName: string, options: CardCsvSourceOptions = {}): RawCard[] {
  assertCardLimit(options.limit);
  const result = Papa.parse<Record<string, string>>(content.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: options.delimiter ?? ',',
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const fatal = result.errors.find((error) => error.type !== 'FieldMismatch');
  if (fatal) {
    throw new CardFileError(`${fileName}: ${fatal.message} (row ${String((fatal.row ?? 0) + 1)})`);
  }

  const cards: RawCard[] = [];
  for (const [i, row] of result.data.entries()) {
    if (options.limit !== undefined && cards.length >= options.limit) break;

    const parsed = cardRowSchema.safeParse(row);
    if (!parsed.success) {
      const missing = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new CardFileError(`${fileName} row ${String(i + 1)}: missing or invalid column(s) ${missing}`);
    }
    cards.push(toRawCard(parsed.data));
  }
  return cards;
}
