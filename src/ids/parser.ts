import { z } from "zod";
import { ParseError } from "../util/errors.js";
import { readInputFile } from "../util/input.js";
import { log } from "../util/logger.js";
import { MAX_ID, MODES, type IdRange, type Mode } from "./types.js";

const bound = z
  .bigint()
  .nonnegative()
  .max(MAX_ID, "ID exceeds the unsigned 64-bit range");

const idRangeSchema = z.object({ start: bound, end: bound });

const DIGITS = /\d+/y;
const SEPARATOR = /,\s*/y;

class Cursor {
  pos = 0;
  constructor(readonly text: string) {}

  match(re: RegExp): string | null {
    re.lastIndex = this.pos;
    const m = re.exec(this.text);
    if (!m) return null;
    this.pos = re.lastIndex;
    return m[0];
  }

  fail(expected: string): never {
    const found = this.text.slice(this.pos, this.pos + 12);
    throw new ParseError(
      `expected ${expected} at offset ${this.pos}, found ${
        found === "" ? "end of input" : JSON.stringify(found)
      }`,
      { offset: this.pos }
    );
  }
}

function readRange(cur: Cursor): IdRange {
  const start = cur.match(DIGITS) ?? cur.fail("range start digits");
  if (cur.match(/-/y) === null) cur.fail("'-'");
  const end = cur.match(DIGITS) ?? cur.fail("range end digits");

  const parsed = idRangeSchema.safeParse({
    start: BigInt(start),
    end: BigInt(end),
  });
  if (!parsed.success) {
    throw new ParseError(
      `invalid range ${start}-${end}: ${parsed.error.issues[0]?.message}`,
      { range: `${start}-${end}` }
    );
  }
  return parsed.data;
}

/** Parses a single `start-end` pair; surrounding whitespace is ignored. */
export function parseIdRange(text: string): IdRange {
  const cur = new Cursor(text.trim());
  const range = readRange(cur);
  if (cur.pos !== cur.text.length) cur.fail("end of range");
  return range;
}

/**
 * Parses `start-end` pairs separated by commas, each comma optionally
 * followed by whitespace. At least one range is required.
 */
export function parseIdRanges(text: string): IdRange[] {
  const cur = new Cursor(text.trim());
  const ranges = [readRange(cur)];
  while (cur.match(SEPARATOR) !== null) {
    ranges.push(readRange(cur));
  }
  if (cur.pos !== cur.text.length) cur.fail("',' or end of input");
  return ranges;
}

export function formatIdRange(range: IdRange): string {
  return `${range.start}-${range.end}`;
}

export async function loadIdRanges(path: string): Promise<IdRange[]> {
  const text = await readInputFile(path);
  try {
    return parseIdRanges(text);
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ParseError(
        `Failed to parse input file ${path}: ${err.message}`,
        { path, ...err.details }
      );
    }
    throw err;
  }
}

function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

/** Unrecognised modes fall back to "two". */
export function parseMode(raw: string): Mode {
  const value = raw.trim().toLowerCase();
  if (isMode(value)) return value;
  log.warn({ mode: raw }, "unrecognised mode, using 'two'");
  return "two";
}
