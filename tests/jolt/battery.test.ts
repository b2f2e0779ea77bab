import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
  largestJoltage,
  parseJoltMode,
  totalJoltage,
} from "../../src/jolt/battery.js";
import { loadBanks, parseBanks } from "../../src/jolt/parser.js";
import { runJolt } from "../../src/jolt/runner.js";
import { ParseError } from "../../src/util/errors.js";

const SAMPLE = fileURLToPath(
  new URL("../../data/day03/sample.txt", import.meta.url)
);

describe("largestJoltage", () => {
  it("picks digits in order to make the largest number", () => {
    expect(largestJoltage("123456", 2)).toBe(56n);
    expect(largestJoltage("8123456789012345", 2)).toBe(95n);
    expect(largestJoltage("9876543210123456", 12)).toBe(987654323456n);
    expect(largestJoltage("5050505050505050", 12)).toBe(555550505050n);
  });

  it("takes the first of equal digits", () => {
    expect(largestJoltage("9919", 2)).toBe(99n);
    expect(largestJoltage("1111", 4)).toBe(1111n);
  });

  it("stays exact for more digits than a number holds", () => {
    expect(largestJoltage("98765432109876543210", 20)).toBe(
      98765432109876543210n
    );
  });

  it("rejects a bank shorter than the digit count", () => {
    expect(() => largestJoltage("12", 12)).toThrow(ParseError);
    expect(() => largestJoltage("12", 12)).toThrow(
      "bank 12 has 2 batteries, need at least 12"
    );
  });
});

describe("totalJoltage", () => {
  it("sums the sample banks in both modes", async () => {
    const banks = await loadBanks(SAMPLE);
    expect(banks).toHaveLength(5);
    expect(totalJoltage(banks, "two")).toBe(446n);
    expect(totalJoltage(banks, "twelve")).toBe(3103758550643n);
  });

  it("keeps totals exact past 2^53", () => {
    const banks = Array.from({ length: 10_000 }, () => "999999999999");
    expect(totalJoltage(banks, "twelve")).toBe(9999999999990000n);
  });
});

describe("parseBanks", () => {
  it("ignores blank lines and rejects non-digits", () => {
    expect(parseBanks("12\n\n34\n")).toEqual(["12", "34"]);
    expect(() => parseBanks("12\n3a4")).toThrow(
      "line 2 is not a bank of digits: 3a4"
    );
  });
});

describe("parseJoltMode", () => {
  it("falls back to 'two'", () => {
    expect(parseJoltMode("twelve")).toBe("twelve");
    expect(parseJoltMode("ten")).toBe("two");
  });
});

describe("runJolt", () => {
  it("reports every bank and the total", async () => {
    const banks = await loadBanks(SAMPLE);
    const report = runJolt(banks, { input: SAMPLE, mode: "twelve" });
    expect(report.total).toBe(3103758550643n);
    expect(report.banks).toHaveLength(5);
    expect(report.banks[3]).toEqual({
      bank: "9876543210123456",
      joltage: 987654323456n,
    });
  });
});
