/** One card of an Anki collection, joined with its note, deck and note type. */
export interface AnkiCard {
  readonly noteId: number;
  readonly cardId: number;
  readonly deckName: string;
  readonly modelName: string;
  readonly cardOrder: number;
  readonly tags: string;
  readonly cardType: number;
  readonly queue: number;
  readonly due: number;
  readonly interval: number;
  readonly factor: number;
  readonly repetitions: number;
  readonly lapses: number;
  /** Note fields by the note type's field names, HTML removed. */
  readonly fields: Readonly<Record<string, string>>;
}

/** Columns exported when none are chosen. They are the columns deck CSVs are read with. */
export const DEFAULT_EXPORT_KEYS = ['Front', 'Back', 'deck_name'] as const;

/**
 * Flat column → value view of a card. Note fields sit beside the card
 * metadata; a field named like a metadata column wins.
 */
export function ankiCardRecord(card: AnkiCard): Record<string, string | number> {
  return {
    note_id: card.noteId,
    card_id: card.cardId,
    deck_name: card.deckName,
    model_name: card.modelName,
    card_order: card.cardOrder,
    tags: card.tags,
    card_type: card.cardType,
    queue: card.queue,
    due: card.due,
    interval: card.interval,
    factor: card.factor,
    repetitions: card.repetitions,
    lapses: card.lapses,
    ...card.fields,
  };
}
