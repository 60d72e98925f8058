import type { FieldSpecification } from '../models/extraction.js';

/**
 * Field Discovery Prompt
 *
 * Template variables to replace:
 * - {documentId}
 * - {pageCount}
 * - {agentPosition}
 * - {existingFields}
 * - {samplePages}
 */

export const DISCOVERY_SYSTEM_PROMPT = `You are a document analyst. You read sample pages of a document and decide which structured fields a complete record of that document should contain. You reply with JSON only.`;

const BASE_DISCOVERY_PROMPT = `# MISSION
Identify the fields that describe this document. Each field will later be filled in by extraction agents that read only part of the document, so every field must be answerable from the document text.

# INPUT
- Document ID: {documentId}
- Total pages: {pageCount}
- Discovery step: {agentPosition}

# FIELDS ALREADY DISCOVERED
{existingFields}

# YOUR TASK
1. Confirm or refine the fields already discovered when the sample pages tell you more about them (a better description, a stricter type, extra validation rules).
2. Add every new field you observe in the sample pages that is not yet captured.
3. Do not repeat a field under a different name.

# FIELD RULES
- name: short snake_case identifier (e.g. "invoice_number", "line_items")
- type: "scalar" for one value, "list" for repeated values, "structured" for one object with named parts
- description: one sentence saying what the value is
- validation_rules: optional constraints, any of pattern, minLength, maxLength, minimum, maximum, enum, minItems, maxItems
- is_required: true only when every document of this kind must contain the field

# OUTPUT
Return a JSON object:
\`\`\`json
{
  "fields": [
    {
      "name": "string",
      "type": "scalar | list | structured",
      "description": "string",
      "validation_rules": {},
      "is_required": false
    }
  ]
}
\`\`\`
Return fields you confirm as well as fields you add.

# SAMPLE PAGES
{samplePages}
`;

export interface DiscoveryPromptContext {
  documentId: string;
  pageCount: number;
  /** 0-based index of this agent in the discovery chain */
  agentIndex: number;
  agentCount: number;
  existingFields: readonly FieldSpecification[];
  pages: ReadonlyArray<{ pageNumber: number; content: string }>;
}

export function formatFieldList(fields: readonly FieldSpecification[]): string {
  if (fields.length === 0) {
    return '(none yet)';
  }
  return JSON.stringify(
    fields.map((field) => ({
      name: field.name,
      type: field.type,
      description: field.description,
      validation_rules: field.validationRules,
      is_required: field.isRequired,
    })),
    null,
    2
  );
}

export function formatPages(pages: ReadonlyArray<{ pageNumber: number; content: string }>): string {
  return pages.map((page) => `--- Page ${page.pageNumber} ---\n${page.content}`).join('\n\n');
}

const DISCOVERY_TOKEN_PATTERN = /\{(documentId|pageCount|agentPosition|existingFields|samplePages)\}/g;

export function buildDiscoveryPrompt(ctx: DiscoveryPromptContext): string {
  const replacements: Record<string, string> = {
    documentId: ctx.documentId,
    pageCount: String(ctx.pageCount),
    agentPosition: `${ctx.agentIndex + 1} of ${ctx.agentCount}`,
    existingFields: formatFieldList(ctx.existingFields),
    samplePages: formatPages(ctx.pages),
  };

  // One pass: substituted text (field descriptions, page text) is never rescanned
  return BASE_DISCOVERY_PROMPT.replace(DISCOVERY_TOKEN_PATTERN, (match, token: string) => replacements[token] ?? match);
}
