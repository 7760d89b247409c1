import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeBatches } from '@unitbatch/core';
import type { RawCard } from '../../src/domain/model/Card.js';
import { toEnhancedCard } from '../../src/domain/model/Card.js';
import { EnhancedCardCsvSink, failedCardsPath } from '../../src/infrastructure/csv/EnhancedCardCsvSink.js';

const cards: RawCard[] = [
  { front: 'hola', back: 'hello', deckName: 'Spanish' },
  { front: 'adiós', back: 'goodbye', deckName: 'Spanish' },
  { front: 'gracias, amigo', back: 'thanks, friend', deckName: 'Spanish' },
];

async function enhance(card: RawCard) {
  await Promise.resolve();
  if (card.front === 'adiós') throw new Error('rate limited');
  return toEnhancedCard(card, { example_sentence_front: `${card.front}!`, example_sentence_back: `${card.back}!` });
}

describe('failedCardsPath', () => {
  it('should replace the csv extension', () => {
    expect(failedCardsPath('/out/spanish.csv')).toBe('/out/spanish.failed.csv');
    expect(failedCardsPath('/out/SPANISH.CSV')).toBe('/out/SPANISH.failed.csv');
    expect(failedCardsPath('/out/spanish')).toBe('/out/spanish.failed.csv');
  });
});

describe('EnhancedCardCsvSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cards-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write successes in input order and failures beside them', async () => {
    const result = await executeBatches(cards, enhance, { batchSize: 2, maxRetries: 0, backoffBaseMs: 0 });
    const output = join(dir, 'nested', 'spanish.csv');

    await new EnhancedCardCsvSink(output, cards).write(result);

    expect(await readFile(output, 'utf-8')).toBe(
      [
        'front,back,deck_name,example_sentence_front,example_sentence_back',
        'hola,hello,Spanish,hola!,hello!',
        '"gracias, amigo","thanks, friend",Spanish,"gracias, amigo!","thanks, friend!"',
        '',
      ].join('\n'),
    );
    expect(await readFile(join(dir, 'nested', 'spanish.failed.csv'), 'utf-8')).toBe(
      [
        'index,front,back,deck_name,reason,attempts,error',
        '1,adiós,goodbye,Spanish,exhausted,1,Gave up after 1 attempt(s): rate limited',
        '',
      ].join('\n'),
    );
  });

  it('should not write a failures file when every card succeeded', async () => {
    const ok = cards.filter((card) => card.front !== 'adiós');
    const result = await executeBatches(ok, enhance, { maxRetries: 0 });
    const output = join(dir, 'spanish.csv');
    const sink = new EnhancedCardCsvSink(output, ok);

    await sink.write(result);

    await expect(access(sink.failedPath)).rejects.toThrow();
    expect((await readFile(output, 'utf-8')).split('\n')).toHaveLength(4);
  });
});
