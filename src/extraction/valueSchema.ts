import type { SchemaObject } from 'ajv';
import type { FieldSpecification, FieldValue, ValidationRules } from '../models/extraction.js';
import { validator } from '../utils/validators.js';

const PRIMITIVE_TYPES = ['string', 'number', 'boolean'];

/**
 * Keywords that constrain a single value. JSON Schema applies string
 * keywords to strings and numeric keywords to numbers only.
 */
function valueKeywords(rules: ValidationRules): SchemaObject {
  const schema: SchemaObject = {};
  if (rules.pattern !== undefined) schema.pattern = rules.pattern;
  if (rules.minLength !== undefined) schema.minLength = rules.minLength;
  if (rules.maxLength !== undefined) schema.maxLength = rules.maxLength;
  if (rules.minimum !== undefined) schema.minimum = rules.minimum;
  if (rules.maximum !== undefined) schema.maximum = rules.maximum;
  if (rules.enum !== undefined) schema.enum = rules.enum;
  return schema;
}

/**
 * JSON schema a value must satisfy to be accepted for a field
 */
export function buildValueSchema(field: FieldSpecification): SchemaObject {
  const rules = field.validationRules;

  switch (field.type) {
    case 'scalar':
      return { type: PRIMITIVE_TYPES, ...valueKeywords(rules) };

    case 'list': {
      const schema: SchemaObject = {
        type: 'array',
        items: { type: [...PRIMITIVE_TYPES, 'object'], ...valueKeywords(rules) },
      };
      if (rules.minItems !== undefined) schema.minItems = rules.minItems;
      if (rules.maxItems !== undefined) schema.maxItems = rules.maxItems;
      return schema;
    }

    case 'structured':
      return { type: 'object' };
  }
}

/**
 * Check a value against its field's type and validation rules.
 * Compiled schemas are cached by their JSON text.
 */
export function isValidFieldValue(field: FieldSpecification, value: FieldValue): boolean {
  const schema = buildValueSchema(field);
  const schemaId = `field-value:${JSON.stringify(schema)}`;
  validator.compileSchema(schemaId, schema);
  return validator.validate(schemaId, value).valid;
}
