import fs from "node:fs";
import path from "node:path";

// bigint sums are written as decimal strings
function replacer(_key: string, value: unknown) {
  return typeof value === "bigint" ? value.toString() : value;
}

export function toJson(report: object): string {
  return JSON.stringify(report, replacer, 2);
}

export async function writeJsonReport(filePath: string, report: object) {
  await fs.promises.writeFile(filePath, toJson(report), "utf8");
}

// <prefix>-report-ddmmyyyy-hhmmss.json
export function reportFileName(prefix: string, now = new Date()) {
  const pad = (n: number) => n.toString().padStart(2, "0");
  const dd = pad(now.getDate());
  const mm = pad(now.getMonth() + 1);
  const yyyy = now.getFullYear();
  const hh = pad(now.getHours());
  const min = pad(now.getMinutes());
  const ss = pad(now.getSeconds());
  return `${prefix}-report-${dd}${mm}${yyyy}-${hh}${min}${ss}.json`;
}

export async function saveReport(
  folder: string,
  prefix: string,
  report: object,
  now = new Date()
): Promise<string> {
  await fs.promises.mkdir(folder, { recursive: true });
  const reportPath = path.join(folder, reportFileName(prefix, now));
  await writeJsonReport(reportPath, report);
  return reportPath;
}
