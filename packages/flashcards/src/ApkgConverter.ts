import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ConfigError, createLogger } from '@unitbatch/core';
import type { AnkiCard } from './domain/model/AnkiCard.js';
import { DEFAULT_EXPORT_KEYS, ankiCardRecord } from './domain/model/AnkiCard.js';
import { extractCollection } from './infrastructure/anki/ApkgArchive.js';
import { readAnkiCollection } from './infrastructure/anki/AnkiCollectionReader.js';
import { writeCsv } from './infrastructure/csv/writeCsv.js';

const keysSchema = z.array(z.string().min(1)).min(1);

export interface ApkgConverterOptions {
  /** Columns to export, from card metadata or note field names. Default: `Front, Back, deck_name`. */
  readonly keys?: readonly string[];
  /** Default: a pino logger at `info`. */
  readonly logger?: Logger;
}

/** One deck CSV written by a conversion. */
export interface DeckExport {
  readonly deckName: string;
  readonly path: string;
  readonly cards: number;
}

export interface ConversionReport {
  readonly apkgPath: string;
  readonly cards: number;
  /** By deck name. Empty when the package holds no cards. */
  readonly decks: DeckExport[];
}

/**
 * Turns an Anki `.apkg` package into one CSV per deck, ready for `DeckEnhancer`.
 *
 * A deck is written to `<last '::' segment of its name>.csv` under the output
 * directory. Field HTML is reduced to text.
 *
 * @example
 * ```typescript
 * const report = await new ApkgConverter().convert('spanish.apkg', 'decks');
 * ```
 */
export class ApkgConverter {
  private readonly keys: readonly string[];
  private readonly logger: Logger;

  /** @throws ConfigError when `keys` is empty or holds an empty name. */
  constructor(options: ApkgConverterOptions = {}) {
    const keys = keysSchema.safeParse(options.keys ?? [...DEFAULT_EXPORT_KEYS]);
    if (!keys.success) {
      throw new ConfigError('Export keys must be a non-empty list of column names');
    }
    this.keys = keys.data;
    this.logger = options.logger ?? createLogger({ name: 'flashcards' });
  }

  /** Read every card of the package. */
  async readCards(apkgPath: string): Promise<AnkiCard[]> {
    const workDir = await mkdtemp(join(tmpdir(), 'apkg-'));
    try {
      const dbPath = await extractCollection(apkgPath, workDir);
      return readAnkiCollection(dbPath);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async convert(apkgPath: string, outputDir: string): Promise<ConversionReport> {
    const log = this.logger.child({ apkg: apkgPath });
    log.info('extracting package');
    const cards = await this.readCards(apkgPath);

    if (cards.length === 0) {
      log.warn('no cards found in package');
      return { apkgPath, cards: 0, decks: [] };
    }

    const byDeck = new Map<string, AnkiCard[]>();
    for (const card of cards) {
      const group = byDeck.get(card.deckName) ?? [];
      group.push(card);
      byDeck.set(card.deckName, group);
    }
    log.info({ cards: cards.length, decks: byDeck.size }, 'cards found');

    const deckNames = [...byDeck.keys()].sort();
    const fileNames = deckFileNames(deckNames);
    const decks: DeckExport[] = [];
    for (const deckName of deckNames) {
      const group = byDeck.get(deckName) ?? [];
      const path = join(outputDir, fileNames.get(deckName) ?? deckFileName(deckName));
      log.info({ deckName, path, cards: group.length }, 'writing deck');

      await writeCsv(path, this.keys, group.map((card) => this.toRow(card)));
      decks.push({ deckName, path, cards: group.length });
    }
    return { apkgPath, cards: cards.length, decks };
  }

  private toRow(card: AnkiCard): string[] {
    const record = ankiCardRecord(card);
    return this.keys.map((key) => {
      const value = record[key];
      return value === undefined ? '' : String(value);
    });
  }
}

/** `Languages::Spanish::Verbs` → `Verbs.csv`. Path separators become `_`. */
export function deckFileName(deckName: string): string {
  const suffix = (deckName.split('::').at(-1) ?? '').trim();
  return `${sanitize(suffix) || 'deck'}.csv`;
}

/**
 * File names for a set of decks. When two decks share a last segment, the
 * later ones are named after their full path instead (`A::Verbs` → `A_Verbs.csv`).
 */
export function deckFileNames(deckNames: readonly string[]): Map<string, string> {
  const taken = new Set<string>();
  const names = new Map<string, string>();
  for (const deckName of deckNames) {
    let name = deckFileName(deckName);
    if (taken.has(name.toLowerCase())) {
      const full = deckName
        .split('::')
        .map((part) => sanitize(part.trim()))
        .join('_');
      name = `${full || 'deck'}.csv`;
      for (let n = 2; taken.has(name.toLowerCase()); n++) {
        name = `${full || 'deck'}-${String(n)}.csv`;
      }
    }
    taken.add(name.toLowerCase());
    names.set(deckName, name);
  }
  return names;
}

function sanitize(segment: string): string {
  return segment.replace(/[\\/]/g, '_');
}
