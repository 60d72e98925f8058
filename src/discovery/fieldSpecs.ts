import {
  FIELD_TYPES,
  type FieldSpecification,
  type FieldType,
  type ValidationRules,
  deepFreeze,
} from '../models/extraction.js';
import { validator } from '../utils/validators.js';

/**
 * Field name normalization and cumulative field-set merging
 */

/**
 * Trim, lower-case and collapse inner whitespace to `_`,
 * so "Total Value " and "total_value" name the same field
 */
export function normalizeFieldName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

/**
 * Combine two rule sets; keys present in `refinement` win
 */
function mergeRules(base: ValidationRules, refinement: ValidationRules): ValidationRules {
  return { ...base, ...refinement };
}

/**
 * Merge an agent's reported fields into the cumulative set.
 *
 * - names are normalized before comparison
 * - a known field is refined: type replaced, description replaced when non-empty,
 *   validation rules unioned, isRequired OR-ed
 * - unknown fields are appended; first-seen order is kept
 * - fields the agent did not mention are kept unchanged
 */
export function mergeFieldSets(
  cumulative: readonly FieldSpecification[],
  reported: readonly FieldSpecification[]
): FieldSpecification[] {
  const merged = new Map<string, FieldSpecification>();

  for (const field of cumulative) {
    merged.set(normalizeFieldName(field.name), { ...field, name: normalizeFieldName(field.name) });
  }

  for (const field of reported) {
    const name = normalizeFieldName(field.name);
    if (!name) continue;

    const existing = merged.get(name);
    if (!existing) {
      merged.set(name, { ...field, name, validationRules: { ...field.validationRules } });
      continue;
    }

    merged.set(name, {
      name,
      type: field.type,
      description: field.description.trim() ? field.description : existing.description,
      validationRules: mergeRules(existing.validationRules, field.validationRules),
      isRequired: existing.isRequired || field.isRequired,
    });
  }

  return [...merged.values()];
}

/**
 * Freeze a field set so every agent shares one immutable copy
 */
export function freezeFieldSet(fields: readonly FieldSpecification[]): readonly FieldSpecification[] {
  return deepFreeze(fields.map((field) => ({ ...field, validationRules: { ...field.validationRules } })));
}

/**
 * Field specification as written by a model or in a fields file.
 * Both snake_case and camelCase keys are accepted.
 */
export interface RawFieldSpecification {
  name: string;
  type: FieldType;
  description?: string;
  validation_rules?: Record<string, unknown>;
  validationRules?: Record<string, unknown>;
  is_required?: boolean;
  isRequired?: boolean;
}

export const FIELD_SPECIFICATION_SCHEMA = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', enum: [...FIELD_TYPES] },
    description: { type: 'string' },
    validation_rules: { type: 'object' },
    validationRules: { type: 'object' },
    is_required: { type: 'boolean' },
    isRequired: { type: 'boolean' },
  },
};

export const FIELD_LIST_SCHEMA = {
  type: 'array',
  items: FIELD_SPECIFICATION_SCHEMA,
};

const validateFieldList = validator.compileTyped<RawFieldSpecification[]>(FIELD_LIST_SCHEMA);

const COUNT_RULES = ['minLength', 'maxLength', 'minItems', 'maxItems'] as const;
const BOUND_RULES = ['minimum', 'maximum'] as const;

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isEnumMember(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'u');
    return true;
  } catch {
    return false;
  }
}

/**
 * Keep only recognised rules with well-typed values; anything else is dropped
 */
export function sanitizeValidationRules(raw: Record<string, unknown> | undefined): ValidationRules {
  const rules: ValidationRules = {};
  if (!raw) {
    return rules;
  }

  if (typeof raw.pattern === 'string' && raw.pattern && isValidPattern(raw.pattern)) {
    rules.pattern = raw.pattern;
  }
  for (const key of COUNT_RULES) {
    const value = raw[key];
    if (isNonNegativeInteger(value)) {
      rules[key] = value;
    }
  }
  for (const key of BOUND_RULES) {
    const value = raw[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      rules[key] = value;
    }
  }
  if (Array.isArray(raw.enum)) {
    const members = raw.enum.filter(isEnumMember);
    if (members.length > 0) {
      rules.enum = members;
    }
  }

  return rules;
}

export function toFieldSpecification(raw: RawFieldSpecification): FieldSpecification {
  return {
    name: normalizeFieldName(raw.name),
    type: raw.type,
    description: raw.description?.trim() ?? '',
    validationRules: sanitizeValidationRules(raw.validation_rules ?? raw.validationRules),
    isRequired: raw.is_required ?? raw.isRequired ?? false,
  };
}

/**
 * Validate a list of raw field specifications and convert it.
 * Entries whose name normalizes to an empty string are skipped.
 *
 * @throws Error naming the schema violations
 */
export function parseFieldSpecifications(data: unknown): FieldSpecification[] {
  if (!validateFieldList(data)) {
    throw new Error(`Invalid field specifications: ${validator.formatErrors(validateFieldList.errors)}`);
  }
  return data.map(toFieldSpecification).filter((field) => field.name.length > 0);
}
