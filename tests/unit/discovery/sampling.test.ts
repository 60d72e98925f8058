import { describe, it, expect } from 'vitest';
import { evenlySpacedPages, planDiscoverySamples } from '../../../src/discovery/sampling.js';
import { planDiscovery } from '../../../src/discovery/DiscoveryCoordinator.js';

describe('evenlySpacedPages', () => {
  it('should spread 8 pages over a 50-page document including both ends', () => {
    expect(evenlySpacedPages(50, 8)).toEqual([1, 8, 15, 22, 29, 36, 43, 50]);
  });

  it('should return every page when the document is shorter than the sample', () => {
    expect(evenlySpacedPages(5, 8)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should return the first page for a sample of one', () => {
    expect(evenlySpacedPages(10, 1)).toEqual([1]);
  });

  it('should return nothing for an empty document', () => {
    expect(evenlySpacedPages(0, 8)).toEqual([]);
  });

  it('should be deterministic', () => {
    expect(evenlySpacedPages(317, 15)).toEqual(evenlySpacedPages(317, 15));
  });
});

describe('planDiscoverySamples', () => {
  it('should deal 45 distinct pages round-robin to three agents', () => {
    const samples = planDiscoverySamples(80, 3, 15);

    expect(samples).toHaveLength(3);
    samples.forEach((sample) => expect(sample).toHaveLength(15));

    const all = samples.flat();
    expect(new Set(all).size).toBe(45);
    expect(samples[0][0]).toBe(1);
    expect(samples[1][0]).toBe(2);
    expect(samples[2][0]).toBe(4);
    expect(samples[2][14]).toBe(80);
  });

  it('should keep every page within the document', () => {
    const all = planDiscoverySamples(51, 3, 15).flat();
    expect(Math.min(...all)).toBe(1);
    expect(Math.max(...all)).toBe(51);
  });
});

describe('planDiscovery', () => {
  it('should use one agent over 8 pages at P=50', () => {
    const plan = planDiscovery(50);

    expect(plan.method).toBe('single-agent');
    expect(plan.samples).toHaveLength(1);
    expect(plan.samples[0]).toHaveLength(8);
  });

  it('should use three agents over 15 pages each at P=51', () => {
    const plan = planDiscovery(51);

    expect(plan.method).toBe('sequential-chain');
    expect(plan.samples.map((sample) => sample.length)).toEqual([15, 15, 15]);
  });
});
