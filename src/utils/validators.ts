import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates model replies and extracted field values against JSON schemas
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile and cache a schema validator
   * @param schemaId Unique identifier for the schema
   * @param schema JSON schema object
   */
  compileSchema(schemaId: string, schema: SchemaObject): ValidateFunction {
    const cached = this.validators.get(schemaId);
    if (cached) {
      return cached;
    }

    const compiled = ajv.compile(schema);
    this.validators.set(schemaId, compiled);
    return compiled;
  }

  /**
   * Compile a schema into a validator that narrows its input to T.
   * Not cached: callers hold the returned function.
   */
  compileTyped<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Validate data against a schema (must be compiled first)
   */
  validate(schemaId: string, data: unknown): ValidationResult {
    const compiled = this.validators.get(schemaId);

    if (!compiled) {
      throw new Error(
        `Schema '${schemaId}' not found. Call compileSchema() first.`
      );
    }

    const valid = compiled(data);

    return {
      valid,
      errors: compiled.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[] | null): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        return `${path}: ${message}`;
      })
      .join('; ');
  }

  /**
   * Clear all cached validators
   */
  clearCache() {
    this.validators.clear();
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

const MAX_CONTENT_LENGTH = 200000;

/**
 * Extract and parse JSON content from model response
 * Handles cases where model returns markdown code blocks or surrounding prose
 */
export function extractJsonFromResponse(content: string): unknown {
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new Error(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH}). Likely truncated/malformed.`
    );
  }

  try {
    return JSON.parse(content);
  } catch {
    // Try to extract JSON from markdown code blocks
    const jsonBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (jsonBlockMatch) {
      try {
        return JSON.parse(jsonBlockMatch[1]);
      } catch {
        // Fall through to other attempts
      }
    }

    // Outermost object in the text
    const first = content.indexOf('{');
    const last = content.lastIndexOf('}');
    if (first !== -1 && last > first) {
      try {
        return JSON.parse(content.slice(first, last + 1));
      } catch {
        // Fall through
      }
    }

    throw new Error('Could not extract valid JSON from response content');
  }
}
