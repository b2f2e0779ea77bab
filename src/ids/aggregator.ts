import { isValidId } from "./classifier.js";
import type { IdRange, Mode, RangeTally, Tally } from "./types.js";

export const EMPTY_TALLY: Readonly<Tally> = Object.freeze({
  count: 0,
  sum: 0n,
});

export function mergeTallies(a: Tally, b: Tally): Tally {
  return { count: a.count + b.count, sum: a.sum + b.sum };
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Invalid IDs of the range in ascending order. The part of the range up to
 * 2^53 - 1 is walked with plain numbers, the rest with bigints.
 */
export function* invalidIdsInRange(
  range: IdRange,
  mode: Mode
): Generator<bigint> {
  if (range.start <= MAX_SAFE) {
    const last = Number(range.end < MAX_SAFE ? range.end : MAX_SAFE);
    for (let id = Number(range.start); id <= last; id++) {
      if (!isValidId(id, mode)) yield BigInt(id);
    }
  }
  const from = range.start > MAX_SAFE ? range.start : MAX_SAFE + 1n;
  for (let id = from; id <= range.end; id++) {
    if (!isValidId(id, mode)) yield id;
  }
}

/** Advisory hooks; nothing they return is used. */
export interface TallyObserver {
  onInvalid?: (id: bigint, range: IdRange) => void;
  onRange?: (result: RangeTally) => void;
}

export function tallyRange(
  range: IdRange,
  mode: Mode,
  observer: TallyObserver = {}
): Tally {
  let tally: Tally = { ...EMPTY_TALLY };
  for (const id of invalidIdsInRange(range, mode)) {
    observer.onInvalid?.(id, range);
    tally = { count: tally.count + 1, sum: tally.sum + id };
  }
  return tally;
}

/**
 * Tallies every range independently and adds the results. With a
 * `chunkSize`, each range is tallied as independent chunks of at most that
 * many IDs and the chunk tallies merged. `onRange` sees each range's own
 * tally once it is done.
 */
export function tallyRanges(
  ranges: readonly IdRange[],
  mode: Mode,
  observer: TallyObserver = {},
  chunkSize?: number
): Tally {
  return ranges.reduce<Tally>((total, range) => {
    const tally =
      chunkSize === undefined
        ? tallyRange(range, mode, observer)
        : splitRange(range, chunkSize)
            .map((chunk) => tallyRange(chunk, mode, observer))
            .reduce(mergeTallies, EMPTY_TALLY);
    observer.onRange?.({ range, ...tally });
    return mergeTallies(total, tally);
  }, EMPTY_TALLY);
}

/**
 * Contiguous sub-ranges of at most `chunkSize` IDs covering `range`.
 * Their tallies merge to the tally of the whole range.
 */
export function splitRange(range: IdRange, chunkSize: number): IdRange[] {
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(
      `chunk size must be a positive integer, got ${chunkSize}`
    );
  }
  const size = BigInt(chunkSize);
  const chunks: IdRange[] = [];
  for (let start = range.start; start <= range.end; start += size) {
    const last = start + size - 1n;
    chunks.push({ start, end: last < range.end ? last : range.end });
  }
  return chunks;
}
