import { UnitBatchError } from '@unitbatch/core';

/** A deck file could not be read as cards. */
export class CardFileError extends UnitBatchError {
  readonly code = 'CARD_FILE_ERROR';
}

/** The model answered, but not with the expected structure. Retried like any other failed attempt. */
export class OutputValidationError extends UnitBatchError {
  readonly code = 'OUTPUT_VALIDATION_ERROR';
}

/** An Anki package could not be opened or its collection could not be read. */
export class AnkiPackageError extends UnitBatchError {
  readonly code = 'ANKI_PACKAGE_ERROR';
}
