export type Mode = "two" | "multiple";

export const MODES: readonly Mode[] = ["two", "multiple"];

/** Largest ID: the unsigned 64-bit maximum. */
export const MAX_ID = 2n ** 64n - 1n;

/**
 * Inclusive range of IDs, 0 to MAX_ID. A range with start > end is empty.
 */
export interface IdRange {
  readonly start: bigint;
  readonly end: bigint;
}

export interface Tally {
  count: number;
  sum: bigint;
}

export interface RangeTally extends Tally {
  range: IdRange;
}
