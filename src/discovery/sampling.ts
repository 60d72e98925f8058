/**
 * Discovery Page Sampling
 *
 * Deterministic, coverage-maximizing page selection. The same page count
 * always yields the same samples, so discovery prompts are reproducible.
 */

/**
 * `count` page numbers spread evenly over [1, pageCount], always including
 * the first and last page. Returns every page when pageCount <= count.
 */
export function evenlySpacedPages(pageCount: number, count: number): number[] {
  if (pageCount <= 0 || count <= 0) {
    return [];
  }
  if (pageCount <= count) {
    return Array.from({ length: pageCount }, (_, i) => i + 1);
  }
  if (count === 1) {
    return [1];
  }

  const pages: number[] = [];
  for (let i = 0; i < count; i++) {
    pages.push(1 + Math.floor((i * (pageCount - 1)) / (count - 1)));
  }
  return pages;
}

/**
 * Page samples for a chain of discovery agents.
 *
 * `agentCount * pagesPerAgent` evenly spaced pages are dealt round-robin,
 * so each agent's selection spans the whole document and no two agents
 * share a page. When the document is too short to give every agent a full
 * disjoint sample, each agent falls back to its own evenly spaced sample.
 */
export function planDiscoverySamples(
  pageCount: number,
  agentCount: number,
  pagesPerAgent: number
): number[][] {
  const total = agentCount * pagesPerAgent;

  if (pageCount < total) {
    return Array.from({ length: agentCount }, () => evenlySpacedPages(pageCount, pagesPerAgent));
  }

  const pool = evenlySpacedPages(pageCount, total);
  const samples: number[][] = Array.from({ length: agentCount }, () => []);
  pool.forEach((page, index) => {
    samples[index % agentCount].push(page);
  });
  return samples;
}
