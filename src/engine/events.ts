import type { DiscoveryMethod } from '../discovery/DiscoveryCoordinator.js';
import type {
  AgentOutcomeStatus,
  FieldSpecification,
  PageRange,
  RecordStatus,
} from '../models/extraction.js';

/**
 * Lifecycle events emitted while a document is processed
 */

interface EventBase {
  documentId: string;
  timestamp: string;
}

export interface FieldInitCompleteEvent extends EventBase {
  type: 'field-init-complete';
  discoveryMethod: DiscoveryMethod;
  fieldSpecifications: readonly FieldSpecification[];
}

export interface AgentScalingCompleteEvent extends EventBase {
  type: 'agent-scaling-complete';
  pageCount: number;
  agentCount: number;
  pageRanges: PageRange[];
  warnings: string[];
}

export interface ExtractionTaskCompleteEvent extends EventBase {
  type: 'extraction-task-complete';
  agentId: string;
  pageRange: PageRange;
  status: AgentOutcomeStatus;
  extractionCount: number;
  durationMs: number;
  error?: string;
}

export interface ExtractionCompleteEvent extends EventBase {
  type: 'extraction-complete';
  recordId: string;
  completionStatus: RecordStatus;
  completedAgents: number;
  agentCount: number;
}

export type EngineEvent =
  | FieldInitCompleteEvent
  | AgentScalingCompleteEvent
  | ExtractionTaskCompleteEvent
  | ExtractionCompleteEvent;

export type EngineEventListener = (event: EngineEvent) => void;
