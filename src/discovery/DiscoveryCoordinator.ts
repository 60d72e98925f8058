import type { DocumentAccessor } from '../document/DocumentAccessor.js';
import type { FieldSpecification } from '../models/extraction.js';
import {
  DiscoveryFailureError,
  DiscoveryLowConfidenceError,
  DiscoveryTimeoutError,
  DocumentAccessError,
  ScalingMisconfigurationError,
  describeError,
} from '../errors.js';
import { RunLogger } from '../utils/logger.js';
import { TaskTimeoutError, runWithTimeout } from '../utils/timeout.js';
import type { DiscoveryAgent, DiscoveryRequest, SampledPage } from './ModelDiscoveryAgent.js';
import { freezeFieldSet, mergeFieldSets } from './fieldSpecs.js';
import { evenlySpacedPages, planDiscoverySamples } from './sampling.js';

/**
 * Discovery Coordinator
 *
 * Decides the field specification set for a document. Short documents get
 * one agent over an 8-page sample; long ones get a chain of three agents over
 * 15 pages each, where every agent sees the fields found before it.
 */

export const SINGLE_AGENT_MAX_PAGES = 50;
export const SINGLE_AGENT_SAMPLE_SIZE = 8;
export const CHAIN_AGENT_COUNT = 3;
export const CHAIN_SAMPLE_SIZE = 15;

export type DiscoveryMethod = 'single-agent' | 'sequential-chain';

export interface DiscoveryPlan {
  method: DiscoveryMethod;
  /** Page numbers per agent, in chain order */
  samples: number[][];
}

export interface DiscoveryResult {
  fields: readonly FieldSpecification[];
  method: DiscoveryMethod;
  agentCount: number;
  samples: number[][];
}

export interface DiscoveryCoordinatorOptions {
  /** Per-call timeout; each call is retried once */
  timeoutMs: number;
  /** Fewer fields than this raises DiscoveryLowConfidenceError */
  minFieldCount: number;
}

/**
 * Branch on page count: P <= 50 runs one agent, P > 50 runs the chain
 */
export function planDiscovery(pageCount: number): DiscoveryPlan {
  if (pageCount <= SINGLE_AGENT_MAX_PAGES) {
    return {
      method: 'single-agent',
      samples: [evenlySpacedPages(pageCount, SINGLE_AGENT_SAMPLE_SIZE)],
    };
  }
  return {
    method: 'sequential-chain',
    samples: planDiscoverySamples(pageCount, CHAIN_AGENT_COUNT, CHAIN_SAMPLE_SIZE),
  };
}

export class DiscoveryCoordinator {
  constructor(
    private agent: DiscoveryAgent,
    private options: DiscoveryCoordinatorOptions
  ) {}

  /**
   * Produce the frozen field set for a document
   *
   * @throws ScalingMisconfigurationError when pageCount is not a positive integer
   * @throws DiscoveryTimeoutError / DiscoveryFailureError after a failed retry
   * @throws DiscoveryLowConfidenceError when too few fields were found
   * @throws DocumentAccessError when a sampled page cannot be read
   */
  async discover(
    documentId: string,
    pageCount: number,
    accessor: DocumentAccessor
  ): Promise<DiscoveryResult> {
    if (!Number.isInteger(pageCount) || pageCount <= 0) {
      throw new ScalingMisconfigurationError(
        `Cannot discover fields for ${documentId}: page count must be a positive integer, got ${pageCount}`,
        documentId
      );
    }

    const log = new RunLogger('DiscoveryCoordinator', documentId);
    const plan = planDiscovery(pageCount);
    const agentCount = plan.samples.length;

    log.info('Starting field discovery', { method: plan.method, agentCount, pageCount });

    // Fold over the ordered agents, carrying the cumulative field set.
    // Agent i+1 starts only once agent i's output is merged.
    const fields = await plan.samples.reduce<Promise<FieldSpecification[]>>(
      async (previous, pageNumbers, agentIndex) => {
        const cumulative = await previous;
        const pages = await this.readPages(accessor, documentId, pageNumbers);

        const reported = await this.runAgent(
          { documentId, pageCount, agentIndex, agentCount, pages, existingFields: freezeFieldSet(cumulative) },
          log
        );

        const merged = mergeFieldSets(cumulative, reported);
        log.debug('Discovery agent finished', {
          agent: agentIndex + 1,
          reported: reported.length,
          cumulative: merged.length,
        });
        return merged;
      },
      Promise.resolve([])
    );

    if (fields.length === 0 || fields.length < this.options.minFieldCount) {
      log.warn('Discovery found too few fields', {
        fieldCount: fields.length,
        minimum: this.options.minFieldCount,
      });
      throw new DiscoveryLowConfidenceError(documentId, fields.length, this.options.minFieldCount);
    }

    log.info('Field discovery complete', { method: plan.method, fieldCount: fields.length });

    return {
      fields: freezeFieldSet(fields),
      method: plan.method,
      agentCount,
      samples: plan.samples,
    };
  }

  private async readPages(
    accessor: DocumentAccessor,
    documentId: string,
    pageNumbers: number[]
  ): Promise<SampledPage[]> {
    try {
      return await Promise.all(
        pageNumbers.map(async (pageNumber) => ({
          pageNumber,
          content: await accessor.getPage(documentId, pageNumber),
        }))
      );
    } catch (error) {
      throw new DocumentAccessError(documentId, error);
    }
  }

  /**
   * One discovery call with its timeout, retried once on timeout or failure
   */
  private async runAgent(
    request: DiscoveryRequest,
    log: RunLogger
  ): Promise<FieldSpecification[]> {
    const attempt = () =>
      runWithTimeout(
        (taskSignal) => this.agent.discover(request, { signal: taskSignal }),
        this.options.timeoutMs
      );

    try {
      return await attempt();
    } catch (error) {
      log.warn('Discovery agent failed, retrying once', {
        agent: request.agentIndex + 1,
        error: describeError(error),
      });
    }

    try {
      return await attempt();
    } catch (error) {
      if (error instanceof TaskTimeoutError) {
        throw new DiscoveryTimeoutError(request.documentId, request.agentIndex, this.options.timeoutMs);
      }
      throw new DiscoveryFailureError(request.documentId, request.agentIndex, error);
    }
  }
}
