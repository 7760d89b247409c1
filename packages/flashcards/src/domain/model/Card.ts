import { z } from 'zod';

/** Columns a deck CSV must provide. Extra columns are ignored. */
export const cardRowSchema = z.object({
  Front: z.string(),
  Back: z.string(),
  deck_name: z.string(),
});

/** Structured output expected from the model for one card. */
export const generatedFieldsSchema = z.object({
  /** An example sentence using the word/phrase from `front`, in the front language. */
  example_sentence_front: z.string().trim().min(1),
  /** Translation of the example sentence in the back language. */
  example_sentence_back: z.string().trim().min(1),
});

export type GeneratedFields = z.infer<typeof generatedFieldsSchema>;

/** Original flashcard as read from a deck file. */
export interface RawCard {
  readonly front: string;
  readonly back: string;
  readonly deckName: string;
}

/** Flashcard with the generated example sentences. */
export interface EnhancedCard extends RawCard {
  readonly exampleSentenceFront: string;
  readonly exampleSentenceBack: string;
}

/** Column order of enhanced deck files. */
export const ENHANCED_CARD_COLUMNS = [
  'front',
  'back',
  'deck_name',
  'example_sentence_front',
  'example_sentence_back',
] as const;

export function toRawCard(row: z.infer<typeof cardRowSchema>): RawCard {
  return { front: row.Front, back: row.Back, deckName: row.deck_name };
}

export function toEnhancedCard(card: RawCard, fields: GeneratedFields): EnhancedCard {
  return {
    ...card,
    exampleSentenceFront: fields.example_sentence_front,
    exampleSentenceBack: fields.example_sentence_back,
  };
}
