import Database from 'better-sqlite3';
import { z } from 'zod';
import type { AnkiCard } from '../../domain/model/AnkiCard.js';
import { AnkiPackageError } from '../../domain/errors.js';
import { cleanHtml } from './cleanHtml.js';

/** Separator between note fields in `notes.flds`. */
const FIELD_SEPARATOR = '\x1f';

const CARDS_QUERY = `
  SELECT
    n.id AS note_id,
    n.flds AS fields,
    n.tags AS tags,
    n.mid AS model_id,
    c.id AS card_id,
    c.ord AS card_order,
    c.type AS card_type,
    c.queue AS card_queue,
    c.due AS due,
    c.ivl AS interval,
    c.factor AS factor,
    c.reps AS repetitions,
    c.lapses AS lapses,
    c.did AS deck_id
  FROM cards c
  JOIN notes n ON c.nid = n.id
  ORDER BY c.did, n.id, c.ord
`;

const collectionRowSchema = z.object({ decks: z.string(), models: z.string() });

const decksSchema = z.record(z.object({ name: z.string().optional() }).passthrough());

const modelsSchema = z.record(
  z
    .object({
      name: z.string().optional(),
      flds: z.array(z.object({ name: z.string() }).passthrough()).optional(),
    })
    .passthrough(),
);

const cardRowSchema = z.object({
  note_id: z.number(),
  fields: z.string(),
  tags: z.string(),
  model_id: z.number(),
  card_id: z.number(),
  card_order: z.number(),
  card_type: z.number(),
  card_queue: z.number(),
  due: z.number(),
  interval: z.number(),
  factor: z.number(),
  repetitions: z.number(),
  lapses: z.number(),
  deck_id: z.number(),
});

/**
 * Read every card of an Anki collection database, ordered by deck, note and
 * card template. Decks and note types missing from the collection get
 * `Unknown Deck (<id>)` / `Unknown Model (<id>)` names.
 */
export function readAnkiCollection(dbPath: string): AnkiCard[] {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    const col = collectionRowSchema.safeParse(db.prepare('SELECT decks, models FROM col LIMIT 1').get());
    if (!col.success) {
      throw new AnkiPackageError(`No collection data found in ${dbPath}`);
    }
    const decks = parseJsonColumn(decksSchema, col.data.decks, 'decks');
    const models = parseJsonColumn(modelsSchema, col.data.models, 'models');

    return db
      .prepare(CARDS_QUERY)
      .all()
      .map((raw, i) => {
        const row = cardRowSchema.safeParse(raw);
        if (!row.success) {
          throw new AnkiPackageError(`Unexpected card row ${String(i + 1)} in ${dbPath}`, { cause: row.error });
        }
        const card = row.data;
        const deckId = String(card.deck_id);
        const modelId = String(card.model_id);
        const model = models[modelId];
        const values = card.fields.split(FIELD_SEPARATOR);

        const fields: Record<string, string> = {};
        for (const [j, field] of (model?.flds ?? []).entries()) {
          fields[field.name] = cleanHtml(values[j] ?? '');
        }

        return {
          noteId: card.note_id,
          cardId: card.card_id,
          deckName: decks[deckId]?.name ?? `Unknown Deck (${deckId})`,
          modelName: model?.name ?? `Unknown Model (${modelId})`,
          cardOrder: card.card_order,
          tags: card.tags,
          cardType: card.card_type,
          queue: card.card_queue,
          due: card.due,
          interval: card.interval,
          factor: card.factor,
          repetitions: card.repetitions,
          lapses: card.lapses,
          fields,
        };
      });
  } finally {
    db.close();
  }
}

function parseJsonColumn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, column: string): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new AnkiPackageError(`Collection column '${column}' is not valid JSON`, { cause: error });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new AnkiPackageError(`Collection column '${column}' has an unexpected shape`, { cause: parsed.error });
  }
  return parsed.data;
}
