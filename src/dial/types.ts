export type Direction = "L" | "R";

export interface Instruction {
  direction: Direction;
  distance: number;
}

export type DialMode = "after" | "during";

export const DIAL_MODES: readonly DialMode[] = ["after", "during"];

export const DIAL_SIZE = 100;
export const DIAL_START = 50;

export interface DialStep {
  instruction: Instruction;
  position: number;
  /** times the dial crossed 0 before coming to rest */
  passes: number;
}
