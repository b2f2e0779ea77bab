#!/usr/bin/env node
import type { Command } from "commander";
import { JOLT_MODES, parseJoltMode, totalJoltage } from "../jolt/battery.js";
import { loadBanks } from "../jolt/parser.js";
import { printHuman } from "../jolt/report.js";
import { runJolt } from "../jolt/runner.js";
import { formatBenchmark, runBenchmark } from "../util/bench.js";
import { log } from "../util/logger.js";
import {
  applyVerbosity,
  type CommonOptions,
  runOrExit,
  saveReportIfConfigured,
  solverProgram,
} from "./common.js";

const program = solverProgram({
  name: "puzzle-jolt",
  description: "Sums the largest joltage each battery bank can produce",
  day: "day03",
  modes: JOLT_MODES,
  defaultMode: "two",
}).action(async (_opts: unknown, command: Command) => {
  const opts = command.opts<CommonOptions>();
  await runOrExit("puzzle-jolt", async () => {
    applyVerbosity(opts);
    const mode = parseJoltMode(opts.mode);
    const banks = await loadBanks(opts.input);
    log.info(
      `Parsed ${banks.length} battery banks from input file ${opts.input}`
    );

    if (opts.bench) {
      const result = runBenchmark(opts.iterations, () => {
        totalJoltage(banks, mode);
      });
      console.log(formatBenchmark(result));
      return;
    }

    const report = runJolt(banks, { input: opts.input, mode });
    printHuman(report);
    await saveReportIfConfigured("jolt", report);
  });
});

await program.parseAsync(process.argv);
