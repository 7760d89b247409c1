import type { UnitOperation } from '@unitbatch/core';
import type { RawCard, EnhancedCard } from '../domain/model/Card.js';
import type { StructuredGenerator } from '../domain/ports/StructuredGenerator.js';
import { generatedFieldsSchema, toEnhancedCard } from '../domain/model/Card.js';
import { CARD_INSTRUCTIONS, buildCardPrompt } from '../domain/services/CardPrompt.js';
import { OutputValidationError } from '../domain/errors.js';

/**
 * Wrap a generator as the unit operation of a run: prompt the model for one
 * card, validate the answer and merge it into the card.
 */
export function createExampleSentenceOperation(generator: StructuredGenerator): UnitOperation<RawCard, EnhancedCard> {
  return async (card, context) => {
    const output = await generator.generate({ instructions: CARD_INSTRUCTIONS, prompt: buildCardPrompt(card) }, context.signal);

    const parsed = generatedFieldsSchema.safeParse(output);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new OutputValidationError(`Model output rejected: ${details}`, { cause: parsed.error });
    }
    return toEnhancedCard(card, parsed.data);
  };
}
