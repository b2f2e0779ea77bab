import { timed } from "../report/format.js";
import { log } from "../util/logger.js";
import { totalJoltage, type BankJoltage, type JoltMode } from "./battery.js";
import type { JoltReport } from "./report.js";

export function runJolt(
  banks: readonly string[],
  opts: { input: string; mode: JoltMode }
): JoltReport {
  const rows: BankJoltage[] = [];
  const { value: total, ...times } = timed(() =>
    totalJoltage(banks, opts.mode, (row) => {
      rows.push(row);
      log.info(
        `- In ${row.bank} you can make the largest joltage possible, ${row.joltage}`
      );
    })
  );
  return { input: opts.input, mode: opts.mode, banks: rows, total, ...times };
}
