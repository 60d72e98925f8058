import type { ModelClient } from '../clients/ModelClient.js';
import type { FieldSpecification } from '../models/extraction.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';
import { FIELD_LIST_SCHEMA, parseFieldSpecifications } from './fieldSpecs.js';
import { DISCOVERY_SYSTEM_PROMPT, buildDiscoveryPrompt } from './prompt.js';

export interface SampledPage {
  pageNumber: number;
  content: string;
}

/**
 * Input to one step of field discovery
 */
export interface DiscoveryRequest {
  documentId: string;
  pageCount: number;
  /** 0-based position in the discovery chain */
  agentIndex: number;
  agentCount: number;
  pages: readonly SampledPage[];
  /** Cumulative field set from earlier agents (empty for the first) */
  existingFields: readonly FieldSpecification[];
}

/**
 * Proposes field specifications from a page sample.
 * Returns the fields it confirms or adds; merging is the coordinator's job.
 */
export interface DiscoveryAgent {
  discover(request: DiscoveryRequest, options?: { signal?: AbortSignal }): Promise<FieldSpecification[]>;
}

interface DiscoveryReply {
  fields: unknown[];
}

const DISCOVERY_REPLY_SCHEMA = {
  type: 'object',
  required: ['fields'],
  additionalProperties: false,
  properties: {
    fields: FIELD_LIST_SCHEMA,
  },
};

const validateReply = validator.compileTyped<DiscoveryReply>(DISCOVERY_REPLY_SCHEMA);

/**
 * Discovery agent backed by a model client
 */
export class ModelDiscoveryAgent implements DiscoveryAgent {
  constructor(
    private client: ModelClient,
    private maxOutputTokens = 8000
  ) {}

  async discover(request: DiscoveryRequest, options: { signal?: AbortSignal } = {}): Promise<FieldSpecification[]> {
    const response = await this.client.invoke(
      {
        system: DISCOVERY_SYSTEM_PROMPT,
        prompt: buildDiscoveryPrompt(request),
        responseSchema: DISCOVERY_REPLY_SCHEMA,
        responseSchemaName: 'field_discovery',
        maxOutputTokens: this.maxOutputTokens,
        temperature: 0,
      },
      { signal: options.signal }
    );

    if (response.finishReason === 'length') {
      throw new Error(`Discovery reply truncated at ${this.maxOutputTokens} output tokens`);
    }

    const reply = extractJsonFromResponse(response.text);
    if (!validateReply(reply)) {
      throw new Error(`Discovery reply failed validation: ${validator.formatErrors(validateReply.errors)}`);
    }

    return parseFieldSpecifications(reply.fields);
  }
}
