import { performance } from 'node:perf_hooks';

/** Returns a function yielding the seconds elapsed since the stopwatch started. */
export function startStopwatch(): () => number {
  const start = performance.now();
  return () => (performance.now() - start) / 1000;
}
