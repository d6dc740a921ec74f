/**
 * Sliding window of store write latencies.
 *
 * @module
 */

export interface LatencyStats {
  count: number;
  meanMs: number;
  maxMs: number;
  p50Ms: number;
  p99Ms: number;
}

export class LatencyTracker {
  private samples: number[] = [];

  constructor(private readonly windowSize = 200) {
    if (windowSize < 1) {
      throw new RangeError(`Latency window must hold at least one sample, got ${windowSize}`);
    }
  }

  record(durationMs: number): void {
    this.samples.push(durationMs);
    if (this.samples.length > this.windowSize) {
      this.samples.splice(0, this.samples.length - this.windowSize);
    }
  }

  get count(): number {
    return this.samples.length;
  }

  p99(): number {
    return percentile(sorted(this.samples), 0.99);
  }

  stats(): LatencyStats {
    const values = sorted(this.samples);
    if (values.length === 0) {
      return { count: 0, meanMs: 0, maxMs: 0, p50Ms: 0, p99Ms: 0 };
    }
    const total = values.reduce((sum, value) => sum + value, 0);
    return {
      count: values.length,
      meanMs: total / values.length,
      maxMs: values[values.length - 1] ?? 0,
      p50Ms: percentile(values, 0.5),
      p99Ms: percentile(values, 0.99),
    };
  }

  reset(): void {
    this.samples = [];
  }
}

function sorted(values: number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Nearest-rank percentile of an ascending list */
export function percentile(sortedValues: number[], p: number): number {
  if (sortedValues.length === 0) return 0;
  const index = Math.ceil(p * sortedValues.length) - 1;
  return sortedValues[Math.max(0, index)] ?? 0;
}
