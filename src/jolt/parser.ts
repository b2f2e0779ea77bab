import { ParseError } from "../util/errors.js";
import { inputLines, readInputFile } from "../util/input.js";

export function parseBanks(text: string): string[] {
  return inputLines(text).map(({ line, lineNo }) => {
    if (!/^\d+$/.test(line)) {
      throw new ParseError(`line ${lineNo} is not a bank of digits: ${line}`, {
        line: lineNo,
      });
    }
    return line;
  });
}

export async function loadBanks(path: string): Promise<string[]> {
  return parseBanks(await readInputFile(path));
}
