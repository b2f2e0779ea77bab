import { performance } from "node:perf_hooks";

export interface BenchmarkResult {
  iterations: number;
  durationMs: number;
  averageMs: number;
}

export function runBenchmark(
  iterations: number,
  fn: () => void
): BenchmarkResult {
  const runs = Math.max(1, Math.floor(iterations));
  const started = performance.now();
  for (let i = 0; i < runs; i++) fn();
  const durationMs = performance.now() - started;
  return { iterations: runs, durationMs, averageMs: durationMs / runs };
}

export function formatBenchmark(result: BenchmarkResult): string {
  return [
    `Benchmark result over ${result.iterations} iterations:`,
    `Duration: ${result.durationMs.toFixed(3)} ms`,
    `Average:  ${result.averageMs.toFixed(3)} ms`,
  ].join("\n");
}
