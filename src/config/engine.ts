import dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';

dotenv.config();

export type ModelProvider = 'openai' | 'anthropic';
export type RecordSinkKind = 'json' | 'postgres';

/**
 * Engine Configuration
 *
 * Thresholds, timeouts and pool sizes for one engine instance.
 * The low-confidence threshold, minimum field count and minimum completed
 * agent fraction have no canonical values; the defaults below are ours.
 */
export interface EngineConfig {
  provider: ModelProvider;
  /** Resolved field confidence below this is flagged lowConfidence */
  lowConfidenceThreshold: number;
  /** Discovery producing fewer fields raises DiscoveryLowConfidence */
  minDiscoveredFields: number;
  /** Fewer completed agents than this fraction marks the record degraded */
  minCompletedAgentFraction: number;
  discoveryTimeoutMs: number;
  agentTimeoutMs: number;
  /** Document-level deadline; undefined disables it */
  documentDeadlineMs?: number;
  /** Lower bound on the worker pool; the pool always holds at least K workers */
  agentPoolSize: number;
  maxConcurrentApiCalls: number;
  requestsPerSecond?: number;
  recordSink: RecordSinkKind;
  recordOutputDir: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  provider: 'openai',
  lowConfidenceThreshold: 0.5,
  minDiscoveredFields: 1,
  minCompletedAgentFraction: 0.5,
  discoveryTimeoutMs: 120000,
  agentTimeoutMs: 180000,
  documentDeadlineMs: undefined,
  agentPoolSize: 10,
  maxConcurrentApiCalls: 20,
  requestsPerSecond: undefined,
  recordSink: 'json',
  recordOutputDir: 'records',
};

type Env = Record<string, string | undefined>;

/** Largest delay setTimeout accepts; longer delays fire at once */
const MAX_TIMER_MS = 2147483647;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  const outOfBounds =
    (bounds.min !== undefined && value < bounds.min) ||
    (bounds.max !== undefined && value > bounds.max);

  if (!Number.isFinite(value) || outOfBounds || (bounds.integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`Invalid value for ${key}: "${raw}"`);
  }

  return value;
}

function readOptionalNumber(env: Env, key: string, bounds: { min?: number; max?: number; integer?: boolean } = {}): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return readNumber(env, key, 0, bounds);
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigurationError(
      `Invalid value for ${key}: "${raw}". Valid options: ${choices.join(', ')}`
    );
  }
  return match;
}

/**
 * Build engine configuration from environment variables
 *
 * @param env Variables to read (defaults to process.env)
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    provider: readChoice(env, 'MODEL_PROVIDER', ['openai', 'anthropic'] as const, DEFAULT_ENGINE_CONFIG.provider),
    lowConfidenceThreshold: readNumber(env, 'LOW_CONFIDENCE_THRESHOLD', DEFAULT_ENGINE_CONFIG.lowConfidenceThreshold, { min: 0, max: 1 }),
    minDiscoveredFields: readNumber(env, 'MIN_DISCOVERED_FIELDS', DEFAULT_ENGINE_CONFIG.minDiscoveredFields, { min: 1, integer: true }),
    minCompletedAgentFraction: readNumber(env, 'MIN_COMPLETED_AGENT_FRACTION', DEFAULT_ENGINE_CONFIG.minCompletedAgentFraction, { min: 0, max: 1 }),
    discoveryTimeoutMs: readNumber(env, 'DISCOVERY_TIMEOUT_MS', DEFAULT_ENGINE_CONFIG.discoveryTimeoutMs, { min: 1, max: MAX_TIMER_MS, integer: true }),
    agentTimeoutMs: readNumber(env, 'AGENT_TIMEOUT_MS', DEFAULT_ENGINE_CONFIG.agentTimeoutMs, { min: 1, max: MAX_TIMER_MS, integer: true }),
    documentDeadlineMs: readOptionalNumber(env, 'DOCUMENT_DEADLINE_MS', { min: 1, max: MAX_TIMER_MS }),
    agentPoolSize: readNumber(env, 'AGENT_POOL_SIZE', DEFAULT_ENGINE_CONFIG.agentPoolSize, { min: 1, integer: true }),
    maxConcurrentApiCalls: readNumber(env, 'MAX_CONCURRENT_API_CALLS', DEFAULT_ENGINE_CONFIG.maxConcurrentApiCalls, { min: 1, integer: true }),
    requestsPerSecond: readOptionalNumber(env, 'REQUESTS_PER_SECOND', { min: 0.001 }),
    recordSink: readChoice(env, 'RECORD_SINK', ['json', 'postgres'] as const, DEFAULT_ENGINE_CONFIG.recordSink),
    recordOutputDir: env.RECORD_OUTPUT_DIR?.trim() || DEFAULT_ENGINE_CONFIG.recordOutputDir,
  };
}
