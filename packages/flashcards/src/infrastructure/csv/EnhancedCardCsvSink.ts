import type { ResultSink, RunResult } from '@unitbatch/core';
import { successes, failures } from '@unitbatch/core';
import type { EnhancedCard, RawCard } from '../../domain/model/Card.js';
import { ENHANCED_CARD_COLUMNS } from '../../domain/model/Card.js';
import { writeCsv } from './writeCsv.js';

const FAILED_CARD_COLUMNS = ['index', 'front', 'back', 'deck_name', 'reason', 'attempts', 'error'] as const;

/** `deck.csv` → `deck.failed.csv`. */
export function failedCardsPath(outputPath: string): string {
  return outputPath.toLowerCase().endsWith('.csv') ? `${outputPath.slice(0, -4)}.failed.csv` : `${outputPath}.failed.csv`;
}

/**
 * Writes enhanced cards, in input order, to a CSV file and the cards that could
 * not be enhanced to a sibling `.failed.csv` file (only when there are any).
 */
export class EnhancedCardCsvSink implements ResultSink<EnhancedCard> {
  constructor(
    private readonly outputPath: string,
    private readonly cards: readonly RawCard[],
  ) {}

  /** Where failures go. */
  get failedPath(): string {
    return failedCardsPath(this.outputPath);
  }

  async write(result: RunResult<EnhancedCard>): Promise<void> {
    const enhanced = successes(result).map(({ value }) => [
      value.front,
      value.back,
      value.deckName,
      value.exampleSentenceFront,
      value.exampleSentenceBack,
    ]);
    await writeCsv(this.outputPath, ENHANCED_CARD_COLUMNS, enhanced);

    const failed = failures(result);
    if (failed.length === 0) return;

    const rows = failed.map((failure) => {
      const card = this.cards[failure.index];
      return [
        String(failure.index),
        card?.front ?? '',
        card?.back ?? '',
        card?.deckName ?? '',
        failure.reason,
        String(failure.attempts),
        failure.error.message,
      ];
    });
    await writeCsv(this.failedPath, FAILED_CARD_COLUMNS, rows);
  }
}
