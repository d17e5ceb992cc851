import AjvModule from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates taxonomy files, batch input files and JSON-encoded citation
 * hints before anything downstream touches them.
 */

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ErrorObject[] };

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  /**
   * Compile a typed validator. Callers keep the returned function at module
   * scope so each schema compiles once.
   */
  compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Validate data with a compiled validator
   */
  validate<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (validate(data)) {
      return { valid: true, data };
    }
    return { valid: false, errors: validate.errors ?? [] };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Parse JSON without throwing. Returns undefined when the text is not JSON.
 */
export function tryParseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}
