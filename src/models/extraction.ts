/**
 * Extraction Data Model
 *
 * Entities shared by discovery, scaling, the agent pool and consolidation.
 * Field specifications and consolidated records are deep-frozen once built;
 * assignments and extractions live only for one processing run.
 */

/**
 * JSON value as returned by a model and stored in a record
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export type FieldType = 'scalar' | 'list' | 'structured';

export const FIELD_TYPES: readonly FieldType[] = ['scalar', 'list', 'structured'];

/**
 * Predicate constraints applied to an extracted value.
 * For list fields the string/number rules apply to every item.
 */
export interface ValidationRules {
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  enum?: Array<string | number | boolean>;
  minItems?: number;
  maxItems?: number;
}

/**
 * Field Specification
 *
 * A named, typed, validated attribute the extraction agents try to fill.
 * `name` is always the normalized form (see normalizeFieldName).
 */
export interface FieldSpecification {
  name: string;
  type: FieldType;
  description: string;
  validationRules: ValidationRules;
  isRequired: boolean;
}

/**
 * Inclusive, 1-indexed span of pages
 */
export interface PageRange {
  startPage: number;
  endPage: number;
}

export interface AgentAssignment {
  agentId: string;
  documentId: string;
  pageRange: PageRange;
  fieldSpecs: readonly FieldSpecification[];
}

/**
 * One observation of one field by one agent
 */
export interface FieldExtraction {
  fieldName: string;
  value: FieldValue;
  confidence: number;
  sourcePageRange: PageRange;
  extractedByAgent: string;
}

export interface ScalingPlan {
  documentId: string;
  pageCount: number;
  /** Agent count from the page-count table, before any clamp */
  requestedAgentCount: number;
  agentCount: number;
  assignments: AgentAssignment[];
  warnings: string[];
}

// ============================================================================
// Agent outcomes
// ============================================================================

export type AgentOutcomeStatus = 'succeeded' | 'timed_out' | 'failed' | 'cancelled';

interface AgentOutcomeBase {
  agentId: string;
  pageRange: PageRange;
  durationMs: number;
}

export type AgentOutcome =
  | (AgentOutcomeBase & { status: 'succeeded'; extractions: FieldExtraction[] })
  | (AgentOutcomeBase & { status: 'timed_out' | 'failed' | 'cancelled'; error: string });

// ============================================================================
// Consolidated record
// ============================================================================

export type RecordStatus = 'complete' | 'degraded' | 'partial';

/**
 * One distinct member of a consolidated list field
 */
export interface ConsolidatedListItem {
  value: FieldValue;
  confidence: number;
  contributingAgents: string[];
}

export interface ResolvedField {
  name: string;
  type: FieldType;
  status: 'resolved';
  value: FieldValue;
  confidence: number;
  lowConfidence: boolean;
  contributingAgents: string[];
  sourcePageRanges: PageRange[];
  /** Present for list fields only */
  items?: ConsolidatedListItem[];
}

export interface MissingField {
  name: string;
  type: FieldType;
  status: 'missing';
  value: null;
  confidence: 0;
  lowConfidence: false;
  contributingAgents: [];
  sourcePageRanges: [];
}

export type ConsolidatedField = ResolvedField | MissingField;

export interface AgentFailureRecord {
  agentId: string;
  pageRange: PageRange;
  kind: 'timeout' | 'failure' | 'cancelled';
  message: string;
}

export interface RecordFlags {
  partial: boolean;
  degraded: boolean;
  escalated: boolean;
  hasMissingRequired: boolean;
  hasLowConfidence: boolean;
}

export interface RecordMetadata {
  agentCount: number;
  completedAgents: number;
  completionRatio: number;
  agentFailures: AgentFailureRecord[];
  discardedExtractions: FieldExtraction[];
  unobservedFields: string[];
  lowConfidenceThreshold: number;
  warnings: string[];
}

export interface ConsolidatedRecord {
  recordId: string;
  documentId: string;
  createdAt: string;
  status: RecordStatus;
  fields: Record<string, ConsolidatedField>;
  missingRequiredFields: string[];
  lowConfidenceFields: string[];
  flags: RecordFlags;
  metadata: RecordMetadata;
}

/**
 * Recursively freeze a value so shared read-only data cannot be mutated
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}
