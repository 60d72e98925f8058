import { describe, it, expect } from 'vitest';
import {
  ModelExtractionAgent,
  appearsLiterally,
  clampConfidence,
} from '../../../src/extraction/ModelExtractionAgent.js';
import { InMemoryDocumentAccessor } from '../../../src/document/DocumentAccessor.js';
import type { AgentAssignment } from '../../../src/models/extraction.js';
import { FakeModelClient, makeField } from '../helpers.js';

class RecordingAccessor extends InMemoryDocumentAccessor {
  pagesRead: number[] = [];

  async getPage(documentId: string, pageNumber: number): Promise<string> {
    this.pagesRead.push(pageNumber);
    return super.getPage(documentId, pageNumber);
  }
}

const PAGES = [
  'Invoice INV-2024-001 issued to Acme Corp',
  'Total due: 1,250.00 EUR',
  'Other page outside range',
];

const assignment: AgentAssignment = {
  agentId: 'agent-01',
  documentId: 'invoice-7',
  pageRange: { startPage: 1, endPage: 2 },
  fieldSpecs: [
    makeField('invoice_number', { validationRules: { pattern: '^INV-' } }),
    makeField('total_amount'),
    makeField('line_items', { type: 'list' }),
    makeField('currency'),
  ],
};

function reply(extractions: Array<{ field_name: string; value: unknown; confidence: number }>): string {
  return JSON.stringify({ extractions });
}

function setup(text: string) {
  const accessor = new RecordingAccessor({ 'invoice-7': PAGES });
  const client = new FakeModelClient(async () => text);
  return { accessor, client, agent: new ModelExtractionAgent(client, accessor) };
}

describe('clampConfidence', () => {
  it('should clamp into [0, 1]', () => {
    expect(clampConfidence(1.7)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(0.42)).toBe(0.42);
    expect(clampConfidence(Number.NaN)).toBe(0);
  });
});

describe('appearsLiterally', () => {
  const text = 'invoice inv-2024-001 issued to acme corp';

  it('should match case-insensitively', () => {
    expect(appearsLiterally('ACME Corp', text)).toBe(true);
  });

  it('should ignore values shorter than three characters', () => {
    expect(appearsLiterally('to', text)).toBe(false);
  });

  it('should require every list item to appear', () => {
    expect(appearsLiterally(['acme', 'invoice'], text)).toBe(true);
    expect(appearsLiterally(['acme', 'globex'], text)).toBe(false);
    expect(appearsLiterally([], text)).toBe(false);
  });

  it('should never match objects or booleans', () => {
    expect(appearsLiterally({ name: 'acme' }, text)).toBe(false);
    expect(appearsLiterally(true, 'true story')).toBe(false);
  });
});

describe('ModelExtractionAgent', () => {
  it('should turn a model reply into validated extractions', async () => {
    const { agent } = setup(
      reply([
        { field_name: 'Invoice Number', value: 'INV-2024-001', confidence: 0.6 },
        { field_name: 'total_amount', value: 'EUR 1250', confidence: 1.7 },
        { field_name: 'line_items', value: 'Consulting', confidence: 0.8 },
        { field_name: 'unknown_field', value: 'x', confidence: 0.9 },
        { field_name: 'total_amount', value: { amount: 1250 }, confidence: 0.9 },
        { field_name: 'invoice_number', value: 'ABC', confidence: 0.99 },
        { field_name: 'currency', value: null, confidence: 0.9 },
      ])
    );

    const extractions = await agent.extract(assignment);

    expect(extractions).toEqual([
      {
        fieldName: 'invoice_number',
        value: 'INV-2024-001',
        confidence: 1,
        sourcePageRange: { startPage: 1, endPage: 2 },
        extractedByAgent: 'agent-01',
      },
      {
        fieldName: 'total_amount',
        value: 'EUR 1250',
        confidence: 1,
        sourcePageRange: { startPage: 1, endPage: 2 },
        extractedByAgent: 'agent-01',
      },
      {
        fieldName: 'line_items',
        value: ['Consulting'],
        confidence: 0.8,
        sourcePageRange: { startPage: 1, endPage: 2 },
        extractedByAgent: 'agent-01',
      },
    ]);
  });

  it('should read only the pages of its range', async () => {
    const { agent, accessor, client } = setup(reply([]));

    await agent.extract(assignment);

    expect(accessor.pagesRead).toEqual([1, 2]);
    expect(client.requests[0].prompt).toContain('--- Page 1 ---\nInvoice INV-2024-001 issued to Acme Corp');
    expect(client.requests[0].prompt).toContain('--- Page 2 ---\nTotal due: 1,250.00 EUR');
    expect(client.requests[0].prompt).not.toContain('Other page outside range');
    expect(client.requests[0].responseSchemaName).toBe('field_extraction');
    expect(client.requests[0].temperature).toBe(0);
  });

  it('should keep the highest-confidence entry for a repeated field', async () => {
    const { agent } = setup(
      reply([
        { field_name: 'total_amount', value: 'about 1200', confidence: 0.4 },
        { field_name: 'total_amount', value: 'roughly 1250', confidence: 0.9 },
        { field_name: 'total_amount', value: 'near 1300', confidence: 0.5 },
      ])
    );

    const extractions = await agent.extract(assignment);

    expect(extractions.map((e) => [e.value, e.confidence])).toEqual([['roughly 1250', 0.9]]);
  });

  it('should merge repeated list entries into one extraction', async () => {
    const { agent } = setup(
      reply([
        { field_name: 'line_items', value: 'Consulting', confidence: 0.8 },
        { field_name: 'line_items', value: 'Hosting', confidence: 0.6 },
        { field_name: 'line_items', value: ['Consulting', 'Support'], confidence: 0.7 },
      ])
    );

    const extractions = await agent.extract(assignment);

    expect(extractions).toEqual([
      {
        fieldName: 'line_items',
        value: ['Consulting', 'Hosting', 'Support'],
        confidence: 0.8,
        sourcePageRange: { startPage: 1, endPage: 2 },
        extractedByAgent: 'agent-01',
      },
    ]);
  });

  it('should treat an empty list as not found', async () => {
    const { agent } = setup(reply([{ field_name: 'line_items', value: [], confidence: 0.95 }]));

    expect(await agent.extract(assignment)).toEqual([]);
  });

  it('should not raise confidence for a short literal value', async () => {
    const { agent } = setup(reply([{ field_name: 'currency', value: 'EU', confidence: 0.4 }]));

    const [extraction] = await agent.extract(assignment);

    expect(extraction.confidence).toBe(0.4);
  });

  it('should accept a reply wrapped in a code block', async () => {
    const { agent } = setup('```json\n{"extractions": []}\n```');

    expect(await agent.extract(assignment)).toEqual([]);
  });

  it('should pass the abort signal to the model client', async () => {
    const accessor = new RecordingAccessor({ 'invoice-7': PAGES });
    const controller = new AbortController();
    let received: AbortSignal | undefined;
    const client = new FakeModelClient(async (_request, options) => {
      received = options.signal;
      return reply([]);
    });

    await new ModelExtractionAgent(client, accessor).extract(assignment, { signal: controller.signal });

    expect(received).toBe(controller.signal);
  });

  it('should reject a truncated reply', async () => {
    const accessor = new RecordingAccessor({ 'invoice-7': PAGES });
    const client = new FakeModelClient(async () => ({ text: reply([]), finishReason: 'length' }));

    await expect(new ModelExtractionAgent(client, accessor, 500).extract(assignment)).rejects.toThrow(
      'Extraction reply truncated at 500 output tokens'
    );
  });

  it('should reject a reply without an extractions array', async () => {
    const { agent } = setup('{"items": []}');

    await expect(agent.extract(assignment)).rejects.toThrow(
      "Extraction reply failed validation: root: must have required property 'extractions'"
    );
  });

  it('should reject text that holds no JSON', async () => {
    const { agent } = setup('I could not find anything.');

    await expect(agent.extract(assignment)).rejects.toThrow('Could not extract valid JSON from response content');
  });
});
