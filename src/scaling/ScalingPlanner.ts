import type { AgentAssignment, FieldSpecification, PageRange, ScalingPlan } from '../models/extraction.js';
import { ScalingMisconfigurationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ScalingPlanner');

/**
 * Agent count by page count:
 *   P < 20        → 2
 *   20 ≤ P ≤ 100  → 5
 *   P > 100       → 10
 */
export function agentCountFor(pageCount: number): number {
  if (pageCount < 20) return 2;
  if (pageCount <= 100) return 5;
  return 10;
}

export function formatAgentId(index: number): string {
  return `agent-${String(index + 1).padStart(2, '0')}`;
}

/**
 * Split [1, pageCount] into `agentCount` contiguous ranges.
 * The first `pageCount mod agentCount` ranges hold one extra page.
 */
export function partitionPages(pageCount: number, agentCount: number): PageRange[] {
  const base = Math.floor(pageCount / agentCount);
  const remainder = pageCount % agentCount;
  const ranges: PageRange[] = [];

  let startPage = 1;
  for (let i = 0; i < agentCount; i++) {
    const size = base + (i < remainder ? 1 : 0);
    ranges.push({ startPage, endPage: startPage + size - 1 });
    startPage += size;
  }

  return ranges;
}

/**
 * Scaling Planner
 *
 * Maps document size to an agent count and hands each agent one page range
 */
export class ScalingPlanner {
  /**
   * @throws ScalingMisconfigurationError when pageCount is not a positive integer
   */
  plan(documentId: string, pageCount: number, fieldSpecs: readonly FieldSpecification[]): ScalingPlan {
    if (!Number.isInteger(pageCount) || pageCount <= 0) {
      throw new ScalingMisconfigurationError(
        `Cannot partition ${documentId}: page count must be a positive integer, got ${pageCount}`,
        documentId
      );
    }

    const requestedAgentCount = agentCountFor(pageCount);
    const warnings: string[] = [];
    let agentCount = requestedAgentCount;

    if (pageCount < requestedAgentCount) {
      agentCount = pageCount;
      const warning = `ScalingMisconfiguration: ${pageCount} page(s) cannot fill ${requestedAgentCount} agents, using ${agentCount}`;
      warnings.push(warning);
      logger.warn(warning, { documentId });
    }

    const assignments: AgentAssignment[] = partitionPages(pageCount, agentCount).map((pageRange, index) => ({
      agentId: formatAgentId(index),
      documentId,
      pageRange,
      fieldSpecs,
    }));

    logger.debug('Scaling plan created', { documentId, pageCount, agentCount });

    return { documentId, pageCount, requestedAgentCount, agentCount, assignments, warnings };
  }
}
