import { describe, expect, it } from "vitest";
import { parseInstruction, parseInstructions } from "../../src/dial/parser.js";
import { ParseError } from "../../src/util/errors.js";

describe("parseInstruction", () => {
  it("parses direction and distance", () => {
    expect(parseInstruction("L68")).toEqual({ direction: "L", distance: 68 });
    expect(parseInstruction("R0")).toEqual({ direction: "R", distance: 0 });
  });

  it("rejects anything else", () => {
    expect(() => parseInstruction("X5")).toThrow(ParseError);
    expect(() => parseInstruction("L")).toThrow("error parsing 'L' on line 1");
    expect(() => parseInstruction("L-5", 4)).toThrow(
      "error parsing 'L-5' on line 4"
    );
  });
});

describe("parseInstructions", () => {
  it("skips blank lines", () => {
    expect(parseInstructions("L1\n\nR2\r\n")).toEqual([
      { direction: "L", distance: 1 },
      { direction: "R", distance: 2 },
    ]);
  });

  it("names the failing line", () => {
    expect(() => parseInstructions("R1\n\nQ2\n")).toThrow(
      "error parsing 'Q2' on line 3"
    );
  });
});
