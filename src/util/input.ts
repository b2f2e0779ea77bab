import fs from "node:fs";
import { InputError, errorMessage } from "./errors.js";

export async function readInputFile(path: string): Promise<string> {
  try {
    return await fs.promises.readFile(path, "utf8");
  } catch (err) {
    throw new InputError(path, errorMessage(err));
  }
}

/** Non-blank lines, trimmed, each with its 1-based line number. */
export function inputLines(text: string): { line: string; lineNo: number }[] {
  return text
    .split(/\r?\n/)
    .map((line, i) => ({ line: line.trim(), lineNo: i + 1 }))
    .filter(({ line }) => line !== "");
}
