import pLimit from 'p-limit';
import type { AgentAssignment, AgentOutcome } from '../models/extraction.js';
import { AgentFailureError, AgentTimeoutError, describeError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { TaskCancelledError, TaskTimeoutError, runWithTimeout } from '../utils/timeout.js';
import type { FieldExtractor } from './ModelExtractionAgent.js';

export interface AgentPoolOptions {
  /** Per-agent timeout */
  agentTimeoutMs: number;
  /** Lower bound on concurrent workers; the pool always runs at least K */
  poolSize: number;
}

export interface AgentPoolRunOptions {
  /** Aborting this signal cancels every in-flight and queued task */
  signal?: AbortSignal;
  /** Called once per task as it reaches its terminal outcome */
  onOutcome?: (outcome: AgentOutcome) => void;
}

export interface AgentPoolResult {
  outcomes: AgentOutcome[];
  /** True when the run signal aborted before every task finished */
  cancelled: boolean;
}

/**
 * Extraction Agent Pool
 *
 * Fans assignments out to a bounded worker pool and joins on every task.
 * A task that times out or throws becomes a failed outcome for its own
 * range only; siblings keep running.
 */
export class AgentPool {
  private logger = createLogger('AgentPool');

  constructor(
    private extractor: FieldExtractor,
    private options: AgentPoolOptions
  ) {}

  /**
   * Run every assignment and wait until all of them reached a terminal state.
   * Never rejects; outcomes keep the order of `assignments`.
   */
  async run(assignments: readonly AgentAssignment[], runOptions: AgentPoolRunOptions = {}): Promise<AgentPoolResult> {
    const { signal, onOutcome } = runOptions;
    const limit = pLimit(Math.max(assignments.length, this.options.poolSize, 1));

    const outcomes = await Promise.all(
      assignments.map((assignment) =>
        limit(async () => {
          const outcome = await this.runTask(assignment, signal);
          this.notify(outcome, onOutcome);
          return outcome;
        })
      )
    );

    return {
      outcomes,
      cancelled: outcomes.some((outcome) => outcome.status === 'cancelled'),
    };
  }

  private async runTask(assignment: AgentAssignment, signal?: AbortSignal): Promise<AgentOutcome> {
    const { agentId, pageRange } = assignment;
    const startTime = Date.now();
    const timeoutMs = this.options.agentTimeoutMs;

    try {
      const extractions = await runWithTimeout(
        (taskSignal) => this.extractor.extract(assignment, { signal: taskSignal }),
        timeoutMs,
        signal
      );
      this.logger.debug('Agent succeeded', { agentId, extractions: extractions.length });
      return { agentId, pageRange, durationMs: Date.now() - startTime, status: 'succeeded', extractions };
    } catch (error) {
      const durationMs = Date.now() - startTime;

      if (error instanceof TaskCancelledError) {
        this.logger.warn('Agent cancelled', { agentId, pageRange });
        return { agentId, pageRange, durationMs, status: 'cancelled', error: error.message };
      }

      if (error instanceof TaskTimeoutError) {
        const timeout = new AgentTimeoutError(agentId, timeoutMs);
        this.logger.warn(timeout.message, { pageRange });
        return { agentId, pageRange, durationMs, status: 'timed_out', error: timeout.message };
      }

      const failure = new AgentFailureError(agentId, describeError(error));
      this.logger.warn(failure.message, { pageRange });
      return { agentId, pageRange, durationMs, status: 'failed', error: failure.message };
    }
  }

  private notify(outcome: AgentOutcome, onOutcome?: (outcome: AgentOutcome) => void): void {
    if (!onOutcome) return;
    try {
      onOutcome(outcome);
    } catch (error) {
      this.logger.error('Outcome listener threw', { agentId: outcome.agentId, error: describeError(error) });
    }
  }
}
