import type { Mode } from "./types.js";

// exact for every safe integer, unlike Math.floor(n / d)
function quotient(n: number, d: number): number {
  return (n - (n % d)) / d;
}

export function digitCount(id: number | bigint): number {
  let digits = 1;
  if (typeof id === "bigint") {
    for (let p = 10n; p <= id; p *= 10n) digits++;
  } else {
    for (let p = 10; p <= id; p *= 10) digits++;
  }
  return digits;
}

function repeatsNumber(id: number, blocks: number, width: number): boolean {
  const pivot = 10 ** width;
  const right = id % pivot;
  let rest = quotient(id, pivot);
  for (let i = 1; i < blocks; i++) {
    if (rest % pivot !== right) return false;
    rest = quotient(rest, pivot);
  }
  return true;
}

function repeatsBigInt(id: bigint, blocks: number, width: number): boolean {
  const pivot = 10n ** BigInt(width);
  const right = id % pivot;
  let rest = id / pivot;
  for (let i = 1; i < blocks; i++) {
    if (rest % pivot !== right) return false;
    rest /= pivot;
  }
  return true;
}

/**
 * First block count that splits the decimal digits of `id` into identical
 * blocks, or null when there is none. Under "two" only the halves are
 * compared; under "multiple" every divisor of the digit count from 2 up to
 * the digit count itself is tried.
 *
 * Safe integers take the `number` path; IDs past 2^53 are passed as bigint.
 */
export function invalidBlockCount(
  id: number | bigint,
  mode: Mode
): number | null {
  const digits = digitCount(id);
  const maxBlocks = mode === "two" ? 2 : digits;

  for (let blocks = 2; blocks <= maxBlocks; blocks++) {
    if (digits % blocks !== 0) continue;
    const width = digits / blocks;
    const repeated =
      typeof id === "bigint"
        ? repeatsBigInt(id, blocks, width)
        : repeatsNumber(id, blocks, width);
    if (repeated) return blocks;
  }
  return null;
}

/** An ID is valid unless its digits are one block repeated. */
export function isValidId(id: number | bigint, mode: Mode): boolean {
  return invalidBlockCount(id, mode) === null;
}
