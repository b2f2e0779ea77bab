import { timed } from "../report/format.js";
import { log } from "../util/logger.js";
import { countZeros, describeStep } from "./dial.js";
import type { DialReport } from "./report.js";
import { DIAL_START, type DialMode, type Instruction } from "./types.js";

export function runDial(
  instructions: readonly Instruction[],
  opts: { input: string; mode: DialMode }
): DialReport {
  let finalPosition = DIAL_START;
  const { value: zeroCount, ...times } = timed(() =>
    countZeros(instructions, opts.mode, (step) => {
      finalPosition = step.position;
      log.info(describeStep(step, opts.mode));
    })
  );
  return {
    input: opts.input,
    mode: opts.mode,
    instructions: instructions.length,
    finalPosition,
    zeroCount,
    ...times,
  };
}
