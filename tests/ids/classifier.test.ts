import { describe, expect, it } from "vitest";
import {
  digitCount,
  invalidBlockCount,
  isValidId,
} from "../../src/ids/classifier.js";

describe("digitCount", () => {
  it("counts decimal digits", () => {
    expect(digitCount(0)).toBe(1);
    expect(digitCount(9)).toBe(1);
    expect(digitCount(10)).toBe(2);
    expect(digitCount(99)).toBe(2);
    expect(digitCount(100)).toBe(3);
    expect(digitCount(1_000_000)).toBe(7);
    expect(digitCount(Number.MAX_SAFE_INTEGER)).toBe(16);
  });
});

describe("isValidId", () => {
  it("treats 0 and single digits as valid in both modes", () => {
    for (let id = 0; id <= 9; id++) {
      expect(isValidId(id, "two")).toBe(true);
      expect(isValidId(id, "multiple")).toBe(true);
    }
  });

  it("marks two identical halves invalid in 'two' mode", () => {
    const fixtures: [number, boolean][] = [
      [11, false],
      [55, false],
      [6464, false],
      [123123, false],
      [101, true],
      [1010, false],
      [12341234, false],
      [111, true],
      [123123123, true],
      [1212121212, true],
    ];
    for (const [id, expected] of fixtures) {
      expect(isValidId(id, "two"), `id ${id}`).toBe(expected);
    }
  });

  it("marks any repeated block invalid in 'multiple' mode", () => {
    const fixtures: [number, boolean][] = [
      [55, false],
      [6464, false],
      [123123, false],
      [123123123, false],
      [1212121212, false],
      [1111111, false],
      [121212, false],
      [111, false],
      [101, true],
      [1231234, true],
    ];
    for (const [id, expected] of fixtures) {
      expect(isValidId(id, "multiple"), `id ${id}`).toBe(expected);
    }
  });

  it("never rejects an odd digit count in 'two' mode", () => {
    for (let id = 100; id < 1000; id++) {
      expect(isValidId(id, "two")).toBe(true);
    }
    for (let id = 10_000; id < 100_000; id += 7) {
      expect(isValidId(id, "two")).toBe(true);
    }
  });

  it("rejects in 'multiple' everything 'two' rejects", () => {
    for (let id = 0; id < 200_000; id++) {
      if (!isValidId(id, "two")) {
        expect(isValidId(id, "multiple"), `id ${id}`).toBe(false);
      }
    }
  });

  it("handles 16-digit IDs up to the largest safe integer", () => {
    expect(isValidId(Number.MAX_SAFE_INTEGER, "two")).toBe(true);
    expect(isValidId(Number.MAX_SAFE_INTEGER, "multiple")).toBe(true);
    expect(isValidId(1234567812345678, "two")).toBe(false);
    expect(isValidId(8888888888888888, "two")).toBe(false);
    expect(isValidId(1234567812345679, "multiple")).toBe(true);
  });
});

describe("invalidBlockCount", () => {
  it("returns null for valid IDs", () => {
    expect(invalidBlockCount(0, "multiple")).toBeNull();
    expect(invalidBlockCount(101, "multiple")).toBeNull();
    expect(invalidBlockCount(123123123, "two")).toBeNull();
  });

  it("returns the first block count that repeats", () => {
    expect(invalidBlockCount(11, "two")).toBe(2);
    expect(invalidBlockCount(123123123, "multiple")).toBe(3);
    expect(invalidBlockCount(1212121212, "multiple")).toBe(5);
    expect(invalidBlockCount(1111111, "multiple")).toBe(7);
    expect(invalidBlockCount(121212, "multiple")).toBe(3);
    expect(invalidBlockCount(222222, "multiple")).toBe(2);
  });
});

describe("64-bit IDs", () => {
  it("agrees with the number path for small bigint IDs", () => {
    for (let id = 0; id < 20_000; id++) {
      expect(isValidId(BigInt(id), "two")).toBe(isValidId(id, "two"));
      expect(isValidId(BigInt(id), "multiple")).toBe(
        isValidId(id, "multiple")
      );
    }
  });

  it("counts digits up to the unsigned 64-bit maximum", () => {
    expect(digitCount(0n)).toBe(1);
    expect(digitCount(9007199254740992n)).toBe(16);
    expect(digitCount(12345678912345678n)).toBe(17);
    expect(digitCount(18446744073709551615n)).toBe(20);
  });

  it("classifies 17 to 20 digit IDs", () => {
    const fixtures: [bigint, boolean, boolean][] = [
      [11111111111111111n, true, false],
      [123123123123123123n, false, false],
      [123456789123456789n, false, false],
      [1231231231231231231n, true, true],
      [9999999999999999999n, true, false],
      [12121212121212121212n, false, false],
      [18446744073709551615n, true, true],
    ];
    for (const [id, two, multiple] of fixtures) {
      expect(isValidId(id, "two"), `${id} two`).toBe(two);
      expect(isValidId(id, "multiple"), `${id} multiple`).toBe(multiple);
    }
  });

  it("finds the repeating block count of big IDs", () => {
    expect(invalidBlockCount(11111111111111111n, "multiple")).toBe(17);
    expect(invalidBlockCount(123123123123123123n, "multiple")).toBe(2);
    expect(invalidBlockCount(9999999999999999999n, "multiple")).toBe(19);
  });
});
