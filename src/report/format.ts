export const pad = (s: string, n = 22) => (s + "...").padEnd(n, ".");

export interface ReportTimes {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export function timed<T>(fn: () => T): { value: T } & ReportTimes {
  const started = Date.now();
  const value = fn();
  const finished = Date.now();
  return {
    value,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started,
  };
}
