import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CardCsvSource, parseCards } from '../../src/infrastructure/csv/CardCsvSource.js';
import { ConfigError } from '@unitbatch/core';
import { CardFileError } from '../../src/domain/errors.js';

describe('parseCards', () => {
  it('should read cards in file order', () => {
    const cards = parseCards('Front,Back,deck_name\nhola,hello,Spanish\ngato,cat,Animals\n', 'deck.csv');

    expect(cards).toEqual([
      { front: 'hola', back: 'hello', deckName: 'Spanish' },
      { front: 'gato', back: 'cat', deckName: 'Animals' },
    ]);
  });

  it('should handle quoted fields and skip empty lines', () => {
    const cards = parseCards('Front,Back,deck_name\n"buenos días, señor","good morning, sir",Spanish\n\n', 'deck.csv');

    expect(cards).toEqual([{ front: 'buenos días, señor', back: 'good morning, sir', deckName: 'Spanish' }]);
  });

  it('should ignore columns it does not use', () => {
    const cards = parseCards('Front,Back,deck_name,Tags\nhola,hello,Spanish,greeting\n', 'deck.csv');

    expect(cards).toEqual([{ front: 'hola', back: 'hello', deckName: 'Spanish' }]);
  });

  it('should name the row that lacks a column', () => {
    const parse = (): unknown => parseCards('Front,Back,deck_name\nhola,hello,Spanish\ngato,cat\n', 'deck.csv');

    expect(parse).toThrow(CardFileError);
    expect(parse).toThrow('deck.csv row 2: missing or invalid column(s) deck_name');
  });

  it('should reject a file without the expected header', () => {
    expect(() => parseCards('Question,Answer\nhola,hello\n', 'deck.csv')).toThrow(
      'deck.csv row 1: missing or invalid column(s) Front, Back, deck_name',
    );
  });

  it('should stop at the limit', () => {
    const cards = parseCards('Front,Back,deck_name\na,1,D\nb,2,D\nc,3,D\n', 'deck.csv', { limit: 2 });

    expect(cards.map((card) => card.front)).toEqual(['a', 'b']);
  });

  it('should reject a limit that is not a positive integer', () => {
    const content = 'Front,Back,deck_name\na,1,D\n';

    expect(() => parseCards(content, 'deck.csv', { limit: 0 })).toThrow(ConfigError);
    expect(() => parseCards(content, 'deck.csv', { limit: 0 })).toThrow('Card limit must be a positive integer, got 0');
    expect(() => parseCards(content, 'deck.csv', { limit: 1.5 })).toThrow(ConfigError);
    expect(() => new CardCsvSource('deck.csv', { limit: -1 })).toThrow(ConfigError);
  });

  it('should return no cards for a header-only file', () => {
    expect(parseCards('Front,Back,deck_name\n', 'deck.csv')).toEqual([]);
  });
});

describe('CardCsvSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cards-source-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a file written with a byte order mark', async () => {
    const file = join(dir, 'spanish.csv');
    await writeFile(file, '\uFEFFFront,Back,deck_name\nhola,hello,Spanish\n', 'utf-8');

    const cards = await new CardCsvSource(file).load();

    expect(cards).toEqual([{ front: 'hola', back: 'hello', deckName: 'Spanish' }]);
  });

  it('should report errors with the file name', async () => {
    const file = join(dir, 'broken.csv');
    await writeFile(file, 'Front,Back,deck_name\nhola\n', 'utf-8');

    await expect(new CardCsvSource(file).load()).rejects.toThrow(
      'broken.csv row 1: missing or invalid column(s) Back, deck_name',
    );
  });
});
