/**
 * Raised while loading a taxonomy: schema violations, invalid regular
 * expressions, duplicate pattern ids.
 */
export class TaxonomyError extends Error {
  readonly entryId?: string;

  constructor(message: string, entryId?: string) {
    super(entryId ? `${message} (entry: ${entryId})` : message);
    this.name = 'TaxonomyError';
    this.entryId = entryId;
  }
}

/**
 * Raised when a batch input file does not match the document schema.
 */
export class InputValidationError extends Error {
  readonly details: string;

  constructor(message: string, details: string) {
    super(`${message}\n${details}`);
    this.name = 'InputValidationError';
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
