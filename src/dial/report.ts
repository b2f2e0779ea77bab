import { pad, type ReportTimes } from "../report/format.js";
import type { DialMode } from "./types.js";

export interface DialReport extends ReportTimes {
  input: string;
  mode: DialMode;
  instructions: number;
  finalPosition: number;
  zeroCount: number;
}

export function printHuman(report: DialReport) {
  console.log(`Dial — mode=${report.mode}`);
  console.log(`Input: ${report.input}`);
  console.log(`  ${pad("instructions")}${report.instructions}`);
  console.log(`  ${pad("final position")}${report.finalPosition}`);
  console.log(`  ${pad("duration ms")}${report.durationMs}`);
  console.log(`Zero count: ${report.zeroCount}`);
}
