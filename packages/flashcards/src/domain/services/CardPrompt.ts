import type { RawCard } from '../model/Card.js';

export const CARD_INSTRUCTIONS =
  'You are a language learning assistant. Generate natural, contextually ' +
  'appropriate example sentences for flashcard vocabulary and phrases.';

/** Prompt asking for an example sentence and its translation for one card. */
export function buildCardPrompt(card: RawCard): string {
  return [
    'Create example sentences for this flashcard:',
    '',
    `Front (question): ${card.front}`,
    `Back (answer): ${card.back}`,
    `Deck: ${card.deckName}`,
    '',
    'The front is in one language and the back is in another.',
    'Generate a natural example sentence in the front language that uses the concept,',
    'and its translation in the back language.',
  ].join('\n');
}
