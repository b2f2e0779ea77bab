import { log } from "../util/logger.js";
import {
  DIAL_MODES,
  DIAL_SIZE,
  DIAL_START,
  type DialMode,
  type DialStep,
  type Instruction,
} from "./types.js";

export function formatInstruction(ins: Instruction): string {
  return `${ins.direction}${ins.distance}`;
}

/**
 * Turns the dial from `position`. `passes` counts the clicks that land on 0
 * along the way, excluding the final resting position.
 */
export function rotate(
  position: number,
  instruction: Instruction
): { position: number; passes: number } {
  const { direction, distance } = instruction;
  let hits: number;
  let landing: number;

  if (direction === "R") {
    hits = Math.floor((position + distance) / DIAL_SIZE);
    landing = (position + distance) % DIAL_SIZE;
  } else {
    // clicks until the first 0 going left
    const first = position === 0 ? DIAL_SIZE : position;
    hits =
      distance < first ? 0 : 1 + Math.floor((distance - first) / DIAL_SIZE);
    landing = (((position - distance) % DIAL_SIZE) + DIAL_SIZE) % DIAL_SIZE;
  }

  return {
    position: landing,
    passes: Math.max(0, hits - (landing === 0 ? 1 : 0)),
  };
}

/**
 * Runs the instructions from the start position. "after" counts rotations
 * that end on 0, "during" also counts every pass through 0.
 */
export function countZeros(
  instructions: readonly Instruction[],
  mode: DialMode,
  onStep?: (step: DialStep) => void
): number {
  let position = DIAL_START;
  let landed = 0;
  let passed = 0;

  for (const instruction of instructions) {
    const next = rotate(position, instruction);
    position = next.position;
    passed += next.passes;
    if (position === 0) landed++;
    onStep?.({ instruction, ...next });
  }

  return mode === "during" ? landed + passed : landed;
}

export function describeStep(step: DialStep, mode: DialMode): string {
  let text = `- The dial is rotated ${formatInstruction(
    step.instruction
  )} to point at ${step.position}`;
  if (mode === "during" && step.passes > 0) {
    text += `; during this rotation, it points at 0 ${step.passes} times`;
  }
  return text + ".";
}

function isDialMode(value: string): value is DialMode {
  return DIAL_MODES.some((m) => m === value);
}

export function parseDialMode(raw: string): DialMode {
  const value = raw.trim().toLowerCase();
  if (isDialMode(value)) return value;
  log.warn({ mode: raw }, "unrecognised mode, using 'after'");
  return "after";
}
