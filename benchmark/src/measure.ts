import type { TimingStats } from "./types.js";

/**
 * Calculate timing statistics from an array of measurements
 */
export function calculateStats(times: number[]): TimingStats {
  if (times.length === 0) {
    return { min: 0, max: 0, mean: 0, samples: 0 };
  }

  const sum = times.reduce((a, b) => a + b, 0);

  return {
    min: Math.min(...times),
    max: Math.max(...times),
    mean: sum / times.length,
    samples: times.length,
  };
}

/**
 * Time one call. Resolves to the elapsed milliseconds, or rejects with the
 * call's error.
 */
export async function timeCall(fn: () => Promise<unknown>): Promise<number> {
  const start = performance.now();
  await fn();
  return Math.max(0, performance.now() - start);
}

/**
 * Format seconds as human-readable string
 */
export function formatSeconds(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${mins}m ${secs.toFixed(0)}s`;
}
