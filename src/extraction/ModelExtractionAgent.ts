import type { ModelClient } from '../clients/ModelClient.js';
import type { DocumentAccessor } from '../document/DocumentAccessor.js';
import type {
  AgentAssignment,
  FieldExtraction,
  FieldSpecification,
  FieldValue,
} from '../models/extraction.js';
import { canonicalJson } from '../consolidation/Consolidator.js';
import { normalizeFieldName } from '../discovery/fieldSpecs.js';
import { createLogger } from '../utils/logger.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from './prompt.js';
import { isValidFieldValue } from './valueSchema.js';

/**
 * Produces field extractions for one page range.
 * Every model backend implements this one capability.
 */
export interface FieldExtractor {
  extract(assignment: AgentAssignment, options?: { signal?: AbortSignal }): Promise<FieldExtraction[]>;
}

interface ExtractionReply {
  extractions: Array<{
    field_name: string;
    value: FieldValue;
    confidence: number;
  }>;
}

const EXTRACTION_REPLY_SCHEMA = {
  type: 'object',
  required: ['extractions'],
  properties: {
    extractions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['field_name', 'value', 'confidence'],
        properties: {
          field_name: { type: 'string' },
          value: {},
          confidence: { type: 'number' },
        },
      },
    },
  },
};

const validateReply = validator.compileTyped<ExtractionReply>(EXTRACTION_REPLY_SCHEMA);

/** Shorter values match too much text by accident to count as literal */
const MIN_LITERAL_LENGTH = 3;

export function clampConfidence(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * True when the value (or, for a list, every item) is written verbatim in the text
 */
export function appearsLiterally(value: FieldValue, normalizedText: string): boolean {
  if (Array.isArray(value)) {
    return value.length > 0 && value.every((item) => appearsLiterally(item, normalizedText));
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return false;
  }
  const needle = normalizeText(String(value));
  return needle.length >= MIN_LITERAL_LENGTH && normalizedText.includes(needle);
}

/**
 * Coerce a reported value toward its field's type before validation
 */
function coerceValue(field: FieldSpecification, value: FieldValue): FieldValue {
  if (field.type === 'list' && !Array.isArray(value)) {
    return [value];
  }
  return value;
}

function isEmptyList(value: FieldValue): boolean {
  return Array.isArray(value) && value.length === 0;
}

/**
 * Distinct items of two list values, in first-seen order
 */
function unionItems(first: FieldValue, second: FieldValue): FieldValue[] {
  const items = new Map<string, FieldValue>();
  for (const value of [first, second]) {
    for (const item of Array.isArray(value) ? value : [value]) {
      const key = canonicalJson(item);
      if (!items.has(key)) items.set(key, item);
    }
  }
  return [...items.values()];
}

/**
 * Extraction agent backed by a model client.
 * Reads only the pages of its own range through the document accessor.
 */
export class ModelExtractionAgent implements FieldExtractor {
  private logger = createLogger('ModelExtractionAgent');

  constructor(
    private client: ModelClient,
    private accessor: DocumentAccessor,
    private maxOutputTokens = 16000
  ) {}

  async extract(assignment: AgentAssignment, options: { signal?: AbortSignal } = {}): Promise<FieldExtraction[]> {
    const { documentId, pageRange } = assignment;

    const pages: Array<{ pageNumber: number; content: string }> = [];
    for (let pageNumber = pageRange.startPage; pageNumber <= pageRange.endPage; pageNumber++) {
      pages.push({ pageNumber, content: await this.accessor.getPage(documentId, pageNumber) });
    }

    const response = await this.client.invoke(
      {
        system: EXTRACTION_SYSTEM_PROMPT,
        prompt: buildExtractionPrompt({ assignment, pages }),
        responseSchema: EXTRACTION_REPLY_SCHEMA,
        responseSchemaName: 'field_extraction',
        maxOutputTokens: this.maxOutputTokens,
        temperature: 0,
      },
      { signal: options.signal }
    );

    if (response.finishReason === 'length') {
      throw new Error(`Extraction reply truncated at ${this.maxOutputTokens} output tokens`);
    }

    const reply = extractJsonFromResponse(response.text);
    if (!validateReply(reply)) {
      throw new Error(`Extraction reply failed validation: ${validator.formatErrors(validateReply.errors)}`);
    }

    const rangeText = normalizeText(pages.map((page) => page.content).join('\n'));
    return this.toExtractions(assignment, reply, rangeText);
  }

  /**
   * Keep one extraction per known field: unknown fields, nulls, empty lists
   * and values breaking the field's rules are dropped. A list field reported
   * several times keeps the union of its items at the best confidence; any
   * other field reported twice keeps its highest-confidence entry.
   */
  private toExtractions(assignment: AgentAssignment, reply: ExtractionReply, rangeText: string): FieldExtraction[] {
    const specs = new Map(assignment.fieldSpecs.map((field) => [field.name, field]));
    const byField = new Map<string, FieldExtraction>();
    let dropped = 0;

    for (const entry of reply.extractions) {
      const field = specs.get(normalizeFieldName(entry.field_name));
      if (!field || entry.value === null) {
        dropped++;
        continue;
      }

      const value = coerceValue(field, entry.value);
      if (isEmptyList(value) || !isValidFieldValue(field, value)) {
        dropped++;
        continue;
      }

      const confidence = appearsLiterally(value, rangeText) ? 1 : clampConfidence(entry.confidence);
      const existing = byField.get(field.name);
      if (existing && field.type === 'list') {
        existing.value = unionItems(existing.value, value);
        existing.confidence = Math.max(existing.confidence, confidence);
        continue;
      }
      if (existing && existing.confidence >= confidence) {
        dropped++;
        continue;
      }

      byField.set(field.name, {
        fieldName: field.name,
        value,
        confidence,
        sourcePageRange: { ...assignment.pageRange },
        extractedByAgent: assignment.agentId,
      });
    }

    if (dropped > 0) {
      this.logger.debug('Dropped extractions', {
        documentId: assignment.documentId,
        agentId: assignment.agentId,
        dropped,
      });
    }

    return [...byField.values()];
  }
}
