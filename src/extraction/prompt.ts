import type { AgentAssignment } from '../models/extraction.js';
import { formatFieldList, formatPages } from '../discovery/prompt.js';

/**
 * Field Extraction Prompt
 *
 * Template variables to replace:
 * - {documentId}
 * - {startPage}
 * - {endPage}
 * - {fieldSpecifications}
 * - {pageText}
 */

export const EXTRACTION_SYSTEM_PROMPT = `You are a precise data extraction agent. You read a contiguous range of pages from a document and fill in the requested fields using only what those pages say. You reply with JSON only.`;

const BASE_EXTRACTION_PROMPT = `# MISSION
Extract values for the fields below from pages {startPage}-{endPage} of document {documentId}. Other agents read the other pages; report only what appears in YOUR pages.

# FIELDS
{fieldSpecifications}

# RULES
- Report a field only when these pages support a value. Leave out fields you cannot find; absence is expected.
- "scalar" fields take one string, number or boolean.
- "list" fields take an array with every distinct value found in these pages.
- "structured" fields take one object whose keys name the parts.
- Respect each field's validation_rules.
- confidence is a number from 0 to 1: 1.0 when the value is written literally in the text, lower when it is inferred or paraphrased.

# OUTPUT
Return a JSON object:
\`\`\`json
{
  "extractions": [
    { "field_name": "string", "value": "any JSON value", "confidence": 0.9 }
  ]
}
\`\`\`

# PAGES
{pageText}
`;

export interface ExtractionPromptContext {
  assignment: AgentAssignment;
  pages: ReadonlyArray<{ pageNumber: number; content: string }>;
}

const EXTRACTION_TOKEN_PATTERN = /\{(documentId|startPage|endPage|fieldSpecifications|pageText)\}/g;

export function buildExtractionPrompt(ctx: ExtractionPromptContext): string {
  const replacements: Record<string, string> = {
    documentId: ctx.assignment.documentId,
    startPage: String(ctx.assignment.pageRange.startPage),
    endPage: String(ctx.assignment.pageRange.endPage),
    fieldSpecifications: formatFieldList(ctx.assignment.fieldSpecs),
    pageText: formatPages(ctx.pages),
  };

  return BASE_EXTRACTION_PROMPT.replace(EXTRACTION_TOKEN_PATTERN, (match, token: string) => replacements[token] ?? match);
}
