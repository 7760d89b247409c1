// Main facade
export { DeckEnhancer, createDeckEnhancerFromEnv } from './DeckEnhancer.js';
export type { DeckEnhancerOptions, DeckReport } from './DeckEnhancer.js';

// Domain model
export {
  cardRowSchema,
  generatedFieldsSchema,
  ENHANCED_CARD_COLUMNS,
  toRawCard,
  toEnhancedCard,
} from './domain/model/Card.js';
export type { RawCard, EnhancedCard, GeneratedFields } from './domain/model/Card.js';

// Errors
export { CardFileError, OutputValidationError, AnkiPackageError } from './domain/errors.js';

// Prompt
export { CARD_INSTRUCTIONS, buildCardPrompt } from './domain/services/CardPrompt.js';

// Operation
export { createExampleSentenceOperation } from './application/ExampleSentenceOperation.js';

// Ports
export type { StructuredGenerator, GenerationRequest } from './domain/ports/StructuredGenerator.js';

// CSV adapters
export { CardCsvSource, parseCards, assertCardLimit } from './infrastructure/csv/CardCsvSource.js';
export type { CardCsvSourceOptions } from './infrastructure/csv/CardCsvSource.js';
export { EnhancedCardCsvSink, failedCardsPath } from './infrastructure/csv/EnhancedCardCsvSink.js';

// Anki packages
export { ApkgConverter, deckFileName, deckFileNames } from './ApkgConverter.js';
export type { ApkgConverterOptions, ConversionReport, DeckExport } from './ApkgConverter.js';
export type { AnkiCard } from './domain/model/AnkiCard.js';
export { DEFAULT_EXPORT_KEYS, ankiCardRecord } from './domain/model/AnkiCard.js';
export { extractCollection, COLLECTION_ENTRIES } from './infrastructure/anki/ApkgArchive.js';
export { readAnkiCollection } from './infrastructure/anki/AnkiCollectionReader.js';
export { cleanHtml } from './infrastructure/anki/cleanHtml.js';
export { writeCsv } from './infrastructure/csv/writeCsv.js';
