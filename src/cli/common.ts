import { Command, InvalidArgumentError } from "commander";
import path from "node:path";
import { saveReport } from "../report/json.js";
import { cfg } from "../util/config.js";
import { errorMessage } from "../util/errors.js";
import { resolveLogLevel, setLogLevel } from "../util/logger.js";

// a type alias so it satisfies commander's OptionValues index signature
export type CommonOptions = {
  input: string;
  mode: string;
  verbose: number;
  quiet: boolean;
  bench: boolean;
  iterations: number;
};

export function countVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return n;
}

export function defaultInput(day: string) {
  return path.join(cfg.DATA_DIR, day, "input.txt");
}

/** Options every solver takes: input, mode, verbosity and benchmarking. */
export function solverProgram(opts: {
  name: string;
  description: string;
  day: string;
  modes: readonly string[];
  defaultMode: string;
}): Command {
  const modes = opts.modes.map((m) => `'${m}'`).join(" or ");
  return new Command()
    .name(opts.name)
    .description(opts.description)
    .option("-i, --input <path>", "Path to input file", defaultInput(opts.day))
    .option("-m, --mode <mode>", `Mode: ${modes}`, opts.defaultMode)
    .option(
      "-v, --verbose",
      "More log output (repeat for more)",
      countVerbosity,
      0
    )
    .option("-q, --quiet", "No log output", false)
    .option("-b, --bench", "Run benchmark", false)
    .option(
      "--iterations <n>",
      "Benchmark iterations",
      parsePositiveInt,
      cfg.BENCH_ITERATIONS
    );
}

export function applyVerbosity(opts: CommonOptions) {
  setLogLevel(resolveLogLevel(opts.verbose, opts.quiet));
}

export async function saveReportIfConfigured(prefix: string, report: object) {
  if (!cfg.REPORT_FOLDER) return;
  const reportPath = await saveReport(cfg.REPORT_FOLDER, prefix, report);
  console.log(`Report written: ${reportPath}`);
}

/** Failures are fatal: print the message and exit non-zero. */
export async function runOrExit(name: string, fn: () => Promise<void>) {
  try {
    await fn();
  } catch (err) {
    console.error(`${name} error:`, errorMessage(err));
    process.exitCode = 1;
  }
}
