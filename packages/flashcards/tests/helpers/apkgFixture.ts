import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import Database from 'better-sqlite3';

export interface FixtureNote {
  readonly id: number;
  readonly modelId: number;
  readonly fields: readonly string[];
  readonly tags?: string;
}

export interface FixtureCard {
  readonly id: number;
  readonly noteId: number;
  readonly deckId: number;
  readonly ord?: number;
}

export interface FixtureCollection {
  readonly decks: Record<string, { name: string }>;
  readonly models: Record<string, { name: string; flds: { name: string }[] }>;
  readonly notes: readonly FixtureNote[];
  readonly cards: readonly FixtureCard[];
}

export const BASIC_MODEL = { name: 'Basic', flds: [{ name: 'Front' }, { name: 'Back' }] };

/** Write a minimal Anki collection database: the columns the reader selects and nothing else. */
export function writeCollection(dbPath: string, collection: FixtureCollection): void {
  const db = new Database(dbPath);
  try {
    db.exec(`
      CREATE TABLE col (id INTEGER PRIMARY KEY, decks TEXT NOT NULL, models TEXT NOT NULL);
      CREATE TABLE notes (id INTEGER PRIMARY KEY, mid INTEGER NOT NULL, flds TEXT NOT NULL, tags TEXT NOT NULL);
      CREATE TABLE cards (
        id INTEGER PRIMARY KEY, nid INTEGER NOT NULL, did INTEGER NOT NULL, ord INTEGER NOT NULL,
        type INTEGER NOT NULL, queue INTEGER NOT NULL, due INTEGER NOT NULL, ivl INTEGER NOT NULL,
        factor INTEGER NOT NULL, reps INTEGER NOT NULL, lapses INTEGER NOT NULL
      );
    `);
    db.prepare('INSERT INTO col (id, decks, models) VALUES (1, ?, ?)').run(
      JSON.stringify(collection.decks),
      JSON.stringify(collection.models),
    );
    const insertNote = db.prepare('INSERT INTO notes (id, mid, flds, tags) VALUES (?, ?, ?, ?)');
    for (const note of collection.notes) {
      insertNote.run(note.id, note.modelId, note.fields.join('\x1f'), note.tags ?? '');
    }
    const insertCard = db.prepare(
      'INSERT INTO cards (id, nid, did, ord, type, queue, due, ivl, factor, reps, lapses) VALUES (?, ?, ?, ?, 2, 2, 30, 12, 2500, 5, 1)',
    );
    for (const card of collection.cards) {
      insertCard.run(card.id, card.noteId, card.deckId, card.ord ?? 0);
    }
  } finally {
    db.close();
  }
}

/**
 * Build `<name>.apkg` in `dir`. `entryName` is the archive name of the
 * database; `null` leaves it out.
 */
export function writeApkg(
  dir: string,
  name: string,
  collection: FixtureCollection,
  entryName: string | null = 'collection.anki2',
): string {
  const zip = new AdmZip();
  if (entryName !== null) {
    const dbPath = join(dir, `${name}.db`);
    writeCollection(dbPath, collection);
    zip.addFile(entryName, readFileSync(dbPath));
  }
  zip.addFile('media', Buffer.from('{}', 'utf-8'));

  const apkgPath = join(dir, `${name}.apkg`);
  zip.writeZip(apkgPath);
  return apkgPath;
}
