import { pad, type ReportTimes } from "../report/format.js";
import type { BankJoltage, JoltMode } from "./battery.js";

export interface JoltReport extends ReportTimes {
  input: string;
  mode: JoltMode;
  banks: BankJoltage[];
  total: bigint;
}

export function printHuman(report: JoltReport) {
  console.log(`Joltage — mode=${report.mode}`);
  console.log(`Input: ${report.input}`);
  console.log("");
  console.log("[BANKS]");
  for (const b of report.banks) {
    console.log(`  ${pad(b.bank, 28)}${b.joltage}`);
  }
  console.log("");
  console.log(`  ${pad("duration ms", 28)}${report.durationMs}`);
  console.log(`Total jolt from all battery lines: ${report.total}`);
}
