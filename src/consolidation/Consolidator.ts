import { v4 as uuidv4 } from 'uuid';
import {
  type AgentFailureRecord,
  type AgentOutcome,
  type ConsolidatedField,
  type ConsolidatedListItem,
  type ConsolidatedRecord,
  type FieldExtraction,
  type FieldSpecification,
  type FieldValue,
  type PageRange,
  type RecordStatus,
  type ResolvedField,
  deepFreeze,
} from '../models/extraction.js';
import { RunLogger } from '../utils/logger.js';

export interface ConsolidatorOptions {
  lowConfidenceThreshold: number;
  minCompletedAgentFraction: number;
  /** Record id source (defaults to uuid v4) */
  generateId?: () => string;
  now?: () => Date;
}

export interface ConsolidationInput {
  documentId: string;
  fieldSpecs: readonly FieldSpecification[];
  /** Terminal outcomes of every dispatched agent */
  outcomes: readonly AgentOutcome[];
  /** The run was cut short by the document deadline */
  cancelled: boolean;
  warnings?: readonly string[];
}

/**
 * JSON text with object keys sorted, so equal values compare equal
 */
export function canonicalJson(value: FieldValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Resolution order: highest confidence, then lowest start page, then lowest agent id
 */
export function compareExtractions(a: FieldExtraction, b: FieldExtraction): number {
  if (a.confidence !== b.confidence) {
    return b.confidence - a.confidence;
  }
  if (a.sourcePageRange.startPage !== b.sourcePageRange.startPage) {
    return a.sourcePageRange.startPage - b.sourcePageRange.startPage;
  }
  return compareIds(a.extractedByAgent, b.extractedByAgent);
}

function byPosition(a: FieldExtraction, b: FieldExtraction): number {
  return (
    a.sourcePageRange.startPage - b.sourcePageRange.startPage ||
    compareIds(a.extractedByAgent, b.extractedByAgent)
  );
}

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

function sortedRanges(extractions: readonly FieldExtraction[]): PageRange[] {
  const seen = new Map<string, PageRange>();
  for (const extraction of [...extractions].sort(byPosition)) {
    const { startPage, endPage } = extraction.sourcePageRange;
    seen.set(`${startPage}-${endPage}`, { startPage, endPage });
  }
  return [...seen.values()];
}

function failureKind(outcome: AgentOutcome): AgentFailureRecord['kind'] | undefined {
  switch (outcome.status) {
    case 'timed_out':
      return 'timeout';
    case 'failed':
      return 'failure';
    case 'cancelled':
      return 'cancelled';
    default:
      return undefined;
  }
}

/**
 * Consolidator
 *
 * Single writer of the consolidated record. Merges every agent's extractions
 * per field; the result does not depend on the order agents finished in.
 */
export class Consolidator {
  private generateId: () => string;
  private now: () => Date;

  constructor(private options: ConsolidatorOptions) {
    this.generateId = options.generateId ?? (() => uuidv4());
    this.now = options.now ?? (() => new Date());
  }

  consolidate(input: ConsolidationInput): ConsolidatedRecord {
    const { documentId, fieldSpecs, outcomes, cancelled } = input;
    const log = new RunLogger('Consolidator', documentId);

    const extractionsByField = new Map<string, FieldExtraction[]>();
    const agentFailures: AgentFailureRecord[] = [];
    let completedAgents = 0;

    for (const outcome of outcomes) {
      if (outcome.status === 'succeeded') {
        completedAgents++;
        for (const extraction of outcome.extractions) {
          const list = extractionsByField.get(extraction.fieldName) ?? [];
          list.push(extraction);
          extractionsByField.set(extraction.fieldName, list);
        }
        continue;
      }
      const kind = failureKind(outcome);
      if (kind) {
        agentFailures.push({
          agentId: outcome.agentId,
          pageRange: { ...outcome.pageRange },
          kind,
          message: outcome.error,
        });
      }
    }

    const fields: Record<string, ConsolidatedField> = {};
    const missingRequiredFields: string[] = [];
    const lowConfidenceFields: string[] = [];
    const unobservedFields: string[] = [];
    const discardedExtractions: FieldExtraction[] = [];

    for (const spec of fieldSpecs) {
      const extractions = extractionsByField.get(spec.name) ?? [];

      if (extractions.length === 0) {
        if (spec.isRequired) {
          fields[spec.name] = {
            name: spec.name,
            type: spec.type,
            status: 'missing',
            value: null,
            confidence: 0,
            lowConfidence: false,
            contributingAgents: [],
            sourcePageRanges: [],
          };
          missingRequiredFields.push(spec.name);
        } else {
          unobservedFields.push(spec.name);
        }
        continue;
      }

      const resolved =
        spec.type === 'list'
          ? this.resolveList(spec, extractions)
          : this.resolveSingle(spec, extractions, discardedExtractions);

      fields[spec.name] = resolved;
      if (resolved.lowConfidence) {
        lowConfidenceFields.push(spec.name);
      }
    }

    const agentCount = outcomes.length;
    const completionRatio = agentCount === 0 ? 0 : completedAgents / agentCount;
    const degraded = completionRatio < this.options.minCompletedAgentFraction;
    const escalated = agentCount > 0 && completedAgents === 0;
    const warnings = [...(input.warnings ?? [])];

    let status: RecordStatus = 'complete';
    if (cancelled) {
      status = 'partial';
    } else if (degraded) {
      status = 'degraded';
    }

    if (degraded) {
      warnings.push(
        `ConsolidationIncomplete: ${completedAgents} of ${agentCount} agents completed (minimum fraction ${this.options.minCompletedAgentFraction})`
      );
    }
    if (escalated) {
      log.error(
        'Every extraction agent failed; record escalated',
        new Error(`0 of ${agentCount} agents completed`),
        { agentFailures }
      );
    }

    const record: ConsolidatedRecord = {
      recordId: this.generateId(),
      documentId,
      createdAt: this.now().toISOString(),
      status,
      fields,
      missingRequiredFields,
      lowConfidenceFields,
      flags: {
        partial: cancelled,
        degraded,
        escalated,
        hasMissingRequired: missingRequiredFields.length > 0,
        hasLowConfidence: lowConfidenceFields.length > 0,
      },
      metadata: {
        agentCount,
        completedAgents,
        completionRatio,
        agentFailures,
        discardedExtractions,
        unobservedFields,
        lowConfidenceThreshold: this.options.lowConfidenceThreshold,
        warnings,
      },
    };

    log.info('Record consolidated', {
      status,
      fields: Object.keys(fields).length,
      missingRequired: missingRequiredFields.length,
      lowConfidence: lowConfidenceFields.length,
    });

    return deepFreeze(record);
  }

  /**
   * Scalar and structured fields: the best extraction wins. Extractions
   * agreeing with the winner corroborate it; the rest are discarded.
   */
  private resolveSingle(
    spec: FieldSpecification,
    extractions: readonly FieldExtraction[],
    discarded: FieldExtraction[]
  ): ResolvedField {
    const [winner, ...others] = [...extractions].sort(compareExtractions);
    const winningKey = canonicalJson(winner.value);
    const agreeing = [winner];

    for (const extraction of others) {
      if (canonicalJson(extraction.value) === winningKey) {
        agreeing.push(extraction);
      } else {
        discarded.push(extraction);
      }
    }

    return {
      name: spec.name,
      type: spec.type,
      status: 'resolved',
      value: winner.value,
      confidence: winner.confidence,
      lowConfidence: winner.confidence < this.options.lowConfidenceThreshold,
      contributingAgents: uniqueSorted(agreeing.map((extraction) => extraction.extractedByAgent)),
      sourcePageRanges: sortedRanges(agreeing),
    };
  }

  /**
   * List fields: union of distinct items, each keeping its best confidence
   * and the agents that reported it. Items are ordered by first occurrence
   * in page order.
   */
  private resolveList(spec: FieldSpecification, extractions: readonly FieldExtraction[]): ResolvedField {
    const items = new Map<string, { value: FieldValue; confidence: number; agents: Set<string> }>();

    for (const extraction of [...extractions].sort(byPosition)) {
      const values = Array.isArray(extraction.value) ? extraction.value : [extraction.value];
      for (const value of values) {
        const key = canonicalJson(value);
        const item = items.get(key);
        if (item) {
          item.confidence = Math.max(item.confidence, extraction.confidence);
          item.agents.add(extraction.extractedByAgent);
        } else {
          items.set(key, {
            value,
            confidence: extraction.confidence,
            agents: new Set([extraction.extractedByAgent]),
          });
        }
      }
    }

    const listItems: ConsolidatedListItem[] = [...items.values()].map((item) => ({
      value: item.value,
      confidence: item.confidence,
      contributingAgents: uniqueSorted(item.agents),
    }));
    // An extraction of an empty list carries no items but still its own confidence
    const confidence =
      listItems.length > 0
        ? Math.max(...listItems.map((item) => item.confidence))
        : Math.max(...extractions.map((extraction) => extraction.confidence));

    return {
      name: spec.name,
      type: spec.type,
      status: 'resolved',
      value: listItems.map((item) => item.value),
      confidence,
      lowConfidence: confidence < this.options.lowConfidenceThreshold,
      contributingAgents: uniqueSorted(extractions.map((extraction) => extraction.extractedByAgent)),
      sourcePageRanges: sortedRanges(extractions),
      items: listItems,
    };
  }
}
