import { pad, type ReportTimes } from "../report/format.js";
import { formatIdRange } from "./parser.js";
import type { Mode, RangeTally, Tally } from "./types.js";

export interface IdsReport extends ReportTimes {
  input: string;
  mode: Mode;
  chunkSize?: number;
  ranges: RangeTally[];
  total: Tally;
}

export function printTotals(total: Tally) {
  console.log(`Total invalid IDs: ${total.count}`);
  console.log(`Sum of invalid IDs: ${total.sum}`);
}

export function printHuman(report: IdsReport) {
  console.log(`Invalid IDs — mode=${report.mode}`);
  console.log(`Input: ${report.input}`);
  if (report.chunkSize) console.log(`Chunk size: ${report.chunkSize}`);
  console.log("");

  console.log("[RANGES]");
  for (const r of report.ranges) {
    console.log(`  ${pad(formatIdRange(r.range), 28)}${r.count} / ${r.sum}`);
  }
  console.log("");

  console.log("[TOTAL]");
  console.log(`  ${pad("ranges", 28)}${report.ranges.length}`);
  console.log(`  ${pad("duration ms", 28)}${report.durationMs}`);
  printTotals(report.total);
}
