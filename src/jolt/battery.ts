import { ParseError } from "../util/errors.js";
import { log } from "../util/logger.js";

export type JoltMode = "two" | "twelve";

export const JOLT_MODES: readonly JoltMode[] = ["two", "twelve"];

export const JOLT_DIGITS: Record<JoltMode, number> = { two: 2, twelve: 12 };

export interface BankJoltage {
  bank: string;
  joltage: bigint;
}

/**
 * Largest number made of `digits` digits taken from `bank` in order. Each
 * pick takes the first highest digit that still leaves enough digits after
 * it for the remaining picks.
 */
export function largestJoltage(bank: string, digits: number): bigint {
  if (bank.length < digits) {
    throw new ParseError(
      `bank ${bank} has ${bank.length} batteries, need at least ${digits}`,
      { bank }
    );
  }

  let joltage = 0n;
  let from = 0;
  for (let left = digits; left > 0; left--) {
    const to = bank.length - left;
    let best = from;
    for (let i = from + 1; i <= to; i++) {
      if (bank[i] > bank[best]) best = i;
    }
    joltage = joltage * 10n + BigInt(bank[best]);
    from = best + 1;
  }
  return joltage;
}

export function totalJoltage(
  banks: readonly string[],
  mode: JoltMode,
  onBank?: (result: BankJoltage) => void
): bigint {
  const digits = JOLT_DIGITS[mode];
  let total = 0n;
  for (const bank of banks) {
    const joltage = largestJoltage(bank, digits);
    onBank?.({ bank, joltage });
    total += joltage;
  }
  return total;
}

function isJoltMode(value: string): value is JoltMode {
  return JOLT_MODES.some((m) => m === value);
}

export function parseJoltMode(raw: string): JoltMode {
  const value = raw.trim().toLowerCase();
  if (isJoltMode(value)) return value;
  log.warn({ mode: raw }, "unrecognised mode, using 'two'");
  return "two";
}
