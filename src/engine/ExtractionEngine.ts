import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engine.js';
import { ProviderFactory } from '../clients/ProviderFactory.js';
import type { ModelClient } from '../clients/ModelClient.js';
import { Consolidator } from '../consolidation/Consolidator.js';
import { DiscoveryCoordinator, type DiscoveryResult } from '../discovery/DiscoveryCoordinator.js';
import { ModelDiscoveryAgent, type DiscoveryAgent } from '../discovery/ModelDiscoveryAgent.js';
import { freezeFieldSet, mergeFieldSets } from '../discovery/fieldSpecs.js';
import type { DocumentAccessor } from '../document/DocumentAccessor.js';
import {
  DocumentAccessError,
  ExtractionEngineError,
  PersistenceFailureError,
} from '../errors.js';
import { AgentPool, type AgentPoolResult } from '../extraction/AgentPool.js';
import { ModelExtractionAgent, type FieldExtractor } from '../extraction/ModelExtractionAgent.js';
import type { ConsolidatedRecord, FieldSpecification } from '../models/extraction.js';
import { createRecordSink } from '../persistence/createRecordSink.js';
import type { RecordSink } from '../persistence/RecordSink.js';
import { ScalingPlanner } from '../scaling/ScalingPlanner.js';
import { RunLogger, createLogger } from '../utils/logger.js';
import type { EngineEvent, EngineEventListener } from './events.js';

export interface ExtractionEngineDependencies {
  accessor: DocumentAccessor;
  discoveryAgent: DiscoveryAgent;
  extractor: FieldExtractor;
  /** Required by processDocument only */
  sink?: RecordSink;
  config?: Partial<EngineConfig>;
  onEvent?: EngineEventListener;
  /** Record id and clock overrides for the consolidator */
  generateId?: () => string;
  now?: () => Date;
}

export type ProcessResult =
  | { ok: true; record: ConsolidatedRecord; version: number }
  | { ok: false; error: ExtractionEngineError };

/**
 * Extraction Engine
 *
 * discover → freeze → plan → fan out extraction → consolidate → persist.
 * Document-level failures surface as named errors; agent-level failures
 * are absorbed into the record.
 */
export class ExtractionEngine {
  private logger = createLogger('ExtractionEngine');
  private config: EngineConfig;
  private accessor: DocumentAccessor;
  private sink?: RecordSink;
  private onEvent?: EngineEventListener;
  private discovery: DiscoveryCoordinator;
  private planner = new ScalingPlanner();
  private pool: AgentPool;
  private consolidator: Consolidator;

  constructor(deps: ExtractionEngineDependencies) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.accessor = deps.accessor;
    this.sink = deps.sink;
    this.onEvent = deps.onEvent;

    this.discovery = new DiscoveryCoordinator(deps.discoveryAgent, {
      timeoutMs: this.config.discoveryTimeoutMs,
      minFieldCount: this.config.minDiscoveredFields,
    });
    this.pool = new AgentPool(deps.extractor, {
      agentTimeoutMs: this.config.agentTimeoutMs,
      poolSize: this.config.agentPoolSize,
    });
    this.consolidator = new Consolidator({
      lowConfidenceThreshold: this.config.lowConfidenceThreshold,
      minCompletedAgentFraction: this.config.minCompletedAgentFraction,
      generateId: deps.generateId,
      now: deps.now,
    });
  }

  /**
   * Wire model-backed agents and the configured sink
   *
   * @param client Defaults to the configured provider's client
   */
  static fromConfig(
    config: EngineConfig,
    accessor: DocumentAccessor,
    options: { client?: ModelClient; sink?: RecordSink; onEvent?: EngineEventListener } = {}
  ): ExtractionEngine {
    const client = options.client ?? ProviderFactory.createClient(config);
    return new ExtractionEngine({
      accessor,
      discoveryAgent: new ModelDiscoveryAgent(client),
      extractor: new ModelExtractionAgent(client, accessor),
      sink: options.sink ?? createRecordSink(config),
      config,
      onEvent: options.onEvent,
    });
  }

  /**
   * Determine the frozen field specification set for a document
   *
   * @throws DiscoveryLowConfidenceError, DiscoveryTimeoutError, DiscoveryFailureError
   */
  async discoverFields(documentId: string): Promise<readonly FieldSpecification[]> {
    return (await this.runDiscovery(documentId)).fields;
  }

  /**
   * Extract a consolidated record for the given field set.
   * Always returns a record once agents are dispatched, possibly flagged
   * partial, degraded or low-confidence.
   *
   * @throws ScalingMisconfigurationError when the page count cannot be partitioned
   */
  async extractStructured(documentId: string, fieldSpecs: readonly FieldSpecification[]): Promise<ConsolidatedRecord> {
    const log = new RunLogger('ExtractionEngine', documentId);
    const frozenSpecs = freezeFieldSet(mergeFieldSets([], fieldSpecs));
    const pageCount = await this.readPageCount(documentId);

    const plan = this.planner.plan(documentId, pageCount, frozenSpecs);
    this.emit({
      type: 'agent-scaling-complete',
      documentId,
      timestamp: new Date().toISOString(),
      pageCount,
      agentCount: plan.agentCount,
      pageRanges: plan.assignments.map((assignment) => ({ ...assignment.pageRange })),
      warnings: [...plan.warnings],
    });

    log.info('Dispatching extraction agents', { pageCount, agentCount: plan.agentCount });

    const deadline = new AbortController();
    const deadlineMs = this.config.documentDeadlineMs;
    const timer =
      deadlineMs === undefined
        ? undefined
        : setTimeout(() => deadline.abort(new Error(`Document deadline of ${deadlineMs}ms exceeded`)), deadlineMs);

    let poolResult: AgentPoolResult;
    try {
      poolResult = await this.pool.run(plan.assignments, {
        signal: deadline.signal,
        onOutcome: (outcome) =>
          this.emit({
            type: 'extraction-task-complete',
            documentId,
            timestamp: new Date().toISOString(),
            agentId: outcome.agentId,
            pageRange: { ...outcome.pageRange },
            status: outcome.status,
            extractionCount: outcome.status === 'succeeded' ? outcome.extractions.length : 0,
            durationMs: outcome.durationMs,
            error: outcome.status === 'succeeded' ? undefined : outcome.error,
          }),
      });
    } finally {
      clearTimeout(timer);
    }

    const record = this.consolidator.consolidate({
      documentId,
      fieldSpecs: frozenSpecs,
      outcomes: poolResult.outcomes,
      cancelled: poolResult.cancelled,
      warnings: plan.warnings,
    });

    this.emit({
      type: 'extraction-complete',
      documentId,
      timestamp: new Date().toISOString(),
      recordId: record.recordId,
      completionStatus: record.status,
      completedAgents: record.metadata.completedAgents,
      agentCount: record.metadata.agentCount,
    });

    return record;
  }

  /**
   * Discover, extract and persist one document.
   * Ends in a record with its stored version or a named failure.
   */
  async processDocument(documentId: string): Promise<ProcessResult> {
    const log = new RunLogger('ExtractionEngine', documentId);
    log.started();

    try {
      const sink = this.sink;
      if (!sink) {
        throw new PersistenceFailureError(documentId, new Error('No record sink configured'));
      }

      const discovery = await this.runDiscovery(documentId);
      const record = await this.extractStructured(documentId, discovery.fields);

      let version: number;
      try {
        ({ version } = await sink.write(documentId, record));
      } catch (error) {
        throw new PersistenceFailureError(documentId, error);
      }

      log.completed({ status: record.status, version, recordId: record.recordId });
      return { ok: true, record, version };
    } catch (error) {
      if (error instanceof ExtractionEngineError) {
        log.failed(error, { code: error.code });
        return { ok: false, error };
      }
      throw error;
    }
  }

  private async runDiscovery(documentId: string): Promise<DiscoveryResult> {
    const pageCount = await this.readPageCount(documentId);
    const result = await this.discovery.discover(documentId, pageCount, this.accessor);

    this.emit({
      type: 'field-init-complete',
      documentId,
      timestamp: new Date().toISOString(),
      discoveryMethod: result.method,
      fieldSpecifications: result.fields,
    });

    return result;
  }

  private async readPageCount(documentId: string): Promise<number> {
    try {
      return await this.accessor.getPageCount(documentId);
    } catch (error) {
      throw new DocumentAccessError(documentId, error);
    }
  }

  private emit(event: EngineEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      this.logger.error('Event listener threw', {
        type: event.type,
        documentId: event.documentId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
