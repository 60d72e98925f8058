/**
 * Shared fakes and factories for unit tests
 */

import type {
  InferenceRequest,
  InferenceResponse,
  InvokeOptions,
  ModelClient,
} from '../../src/clients/ModelClient.js';
import type { DiscoveryAgent, DiscoveryRequest } from '../../src/discovery/ModelDiscoveryAgent.js';
import type { FieldExtractor } from '../../src/extraction/ModelExtractionAgent.js';
import type {
  AgentAssignment,
  AgentOutcome,
  ConsolidatedRecord,
  FieldExtraction,
  FieldSpecification,
  FieldValue,
} from '../../src/models/extraction.js';
import type { RecordSink, RecordWriteResult } from '../../src/persistence/RecordSink.js';

export function makeField(name: string, overrides: Partial<FieldSpecification> = {}): FieldSpecification {
  return {
    name,
    type: 'scalar',
    description: `${name} description`,
    validationRules: {},
    isRequired: false,
    ...overrides,
  };
}

export function makePages(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `Content of page ${i + 1}`);
}

export function makeExtraction(
  fieldName: string,
  value: FieldValue,
  confidence: number,
  agentId: string,
  startPage: number,
  endPage = startPage
): FieldExtraction {
  return {
    fieldName,
    value,
    confidence,
    sourcePageRange: { startPage, endPage },
    extractedByAgent: agentId,
  };
}

export function succeeded(
  agentId: string,
  startPage: number,
  endPage: number,
  extractions: FieldExtraction[]
): AgentOutcome {
  return { agentId, pageRange: { startPage, endPage }, durationMs: 5, status: 'succeeded', extractions };
}

export function failed(
  agentId: string,
  startPage: number,
  endPage: number,
  status: 'timed_out' | 'failed' | 'cancelled' = 'failed',
  error = `Agent ${agentId} failed: boom`
): AgentOutcome {
  return { agentId, pageRange: { startPage, endPage }, durationMs: 5, status, error };
}

/**
 * Rejects once `signal` aborts; never settles otherwise
 */
export function untilAborted<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * Model client that answers from a handler and records every request
 */
export class FakeModelClient implements ModelClient {
  readonly provider = 'fake';
  requests: InferenceRequest[] = [];

  constructor(
    private handler: (request: InferenceRequest, options: InvokeOptions) => Promise<Partial<InferenceResponse> | string>
  ) {}

  async invoke(request: InferenceRequest, options: InvokeOptions = {}): Promise<InferenceResponse> {
    this.requests.push(request);
    const reply = await this.handler(request, options);
    if (typeof reply === 'string') {
      return { text: reply, finishReason: 'stop', model: 'fake-model' };
    }
    return { text: '', finishReason: 'stop', model: 'fake-model', ...reply };
  }
}

export class ScriptedDiscoveryAgent implements DiscoveryAgent {
  calls: DiscoveryRequest[] = [];

  constructor(
    private handler: (request: DiscoveryRequest, signal?: AbortSignal) => Promise<FieldSpecification[]>
  ) {}

  async discover(request: DiscoveryRequest, options: { signal?: AbortSignal } = {}): Promise<FieldSpecification[]> {
    this.calls.push(request);
    return this.handler(request, options.signal);
  }
}

export class ScriptedExtractor implements FieldExtractor {
  calls: AgentAssignment[] = [];

  constructor(
    private handler: (assignment: AgentAssignment, signal?: AbortSignal) => Promise<FieldExtraction[]>
  ) {}

  async extract(assignment: AgentAssignment, options: { signal?: AbortSignal } = {}): Promise<FieldExtraction[]> {
    this.calls.push(assignment);
    return this.handler(assignment, options.signal);
  }
}

export class InMemoryRecordSink implements RecordSink {
  records = new Map<string, ConsolidatedRecord[]>();

  async write(documentId: string, record: ConsolidatedRecord): Promise<RecordWriteResult> {
    const versions = this.records.get(documentId) ?? [];
    versions.push(record);
    this.records.set(documentId, versions);
    return { version: versions.length };
  }
}
