import { ParseError } from "../util/errors.js";
import { inputLines, readInputFile } from "../util/input.js";
import type { Instruction } from "./types.js";

const INSTRUCTION = /^([LR])(\d+)$/;

export function parseInstruction(line: string, lineNo = 1): Instruction {
  const m = INSTRUCTION.exec(line.trim());
  if (!m) {
    throw new ParseError(`error parsing '${line}' on line ${lineNo}`, {
      line: lineNo,
    });
  }
  const distance = Number(m[2]);
  if (!Number.isSafeInteger(distance)) {
    throw new ParseError(`rotation too large on line ${lineNo}: ${m[2]}`, {
      line: lineNo,
    });
  }
  return { direction: m[1] === "L" ? "L" : "R", distance };
}

export function parseInstructions(text: string): Instruction[] {
  return inputLines(text).map(({ line, lineNo }) =>
    parseInstruction(line, lineNo)
  );
}

export async function loadInstructions(path: string): Promise<Instruction[]> {
  return parseInstructions(await readInputFile(path));
}
