/**
 * Engine Error Classes
 *
 * Document-level errors (discovery, scaling, persistence) reach the caller.
 * Agent-level errors are caught by the agent pool and recorded on the
 * consolidated record instead of being thrown.
 */

export type EngineErrorCode =
  | 'DISCOVERY_TIMEOUT'
  | 'DISCOVERY_FAILURE'
  | 'DISCOVERY_LOW_CONFIDENCE'
  | 'SCALING_MISCONFIGURATION'
  | 'AGENT_TIMEOUT'
  | 'AGENT_FAILURE'
  | 'PERSISTENCE_FAILURE'
  | 'DOCUMENT_ACCESS_FAILURE'
  | 'CONFIGURATION_ERROR';

export class ExtractionEngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly documentId?: string
  ) {
    super(message);
    this.name = 'ExtractionEngineError';
  }
}

export class DiscoveryTimeoutError extends ExtractionEngineError {
  constructor(
    documentId: string,
    public readonly agentIndex: number,
    public readonly timeoutMs: number
  ) {
    super(
      `Discovery agent ${agentIndex + 1} timed out after ${timeoutMs}ms (retried once)`,
      'DISCOVERY_TIMEOUT',
      documentId
    );
    this.name = 'DiscoveryTimeoutError';
  }
}

export class DiscoveryFailureError extends ExtractionEngineError {
  constructor(
    documentId: string,
    public readonly agentIndex: number,
    public readonly underlying: unknown
  ) {
    super(
      `Discovery agent ${agentIndex + 1} failed: ${describeError(underlying)}`,
      'DISCOVERY_FAILURE',
      documentId
    );
    this.name = 'DiscoveryFailureError';
  }
}

export class DiscoveryLowConfidenceError extends ExtractionEngineError {
  constructor(
    documentId: string,
    public readonly fieldCount: number,
    public readonly minimumFieldCount: number
  ) {
    super(
      `Discovery produced ${fieldCount} field(s), minimum is ${minimumFieldCount}`,
      'DISCOVERY_LOW_CONFIDENCE',
      documentId
    );
    this.name = 'DiscoveryLowConfidenceError';
  }
}

export class ScalingMisconfigurationError extends ExtractionEngineError {
  constructor(message: string, documentId?: string) {
    super(message, 'SCALING_MISCONFIGURATION', documentId);
    this.name = 'ScalingMisconfigurationError';
  }
}

export class AgentTimeoutError extends ExtractionEngineError {
  constructor(
    public readonly agentId: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agentId} timed out after ${timeoutMs}ms`, 'AGENT_TIMEOUT');
    this.name = 'AgentTimeoutError';
  }
}

export class AgentFailureError extends ExtractionEngineError {
  constructor(
    public readonly agentId: string,
    message: string
  ) {
    super(`Agent ${agentId} failed: ${message}`, 'AGENT_FAILURE');
    this.name = 'AgentFailureError';
  }
}

export class PersistenceFailureError extends ExtractionEngineError {
  constructor(
    documentId: string,
    public readonly underlying: unknown
  ) {
    super(`Record sink rejected write: ${describeError(underlying)}`, 'PERSISTENCE_FAILURE', documentId);
    this.name = 'PersistenceFailureError';
  }
}

export class DocumentAccessError extends ExtractionEngineError {
  constructor(
    documentId: string,
    public readonly underlying: unknown
  ) {
    super(`Could not read document ${documentId}: ${describeError(underlying)}`, 'DOCUMENT_ACCESS_FAILURE', documentId);
    this.name = 'DocumentAccessError';
  }
}

export class ConfigurationError extends ExtractionEngineError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
