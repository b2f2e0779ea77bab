#!/usr/bin/env node
import type { Command } from "commander";
import { countZeros, parseDialMode } from "../dial/dial.js";
import { loadInstructions } from "../dial/parser.js";
import { printHuman } from "../dial/report.js";
import { runDial } from "../dial/runner.js";
import { DIAL_MODES } from "../dial/types.js";
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
  name: "puzzle-dial",
  description:
    "Counts how often a safe dial points at 0 while following rotations",
  day: "day01",
  modes: DIAL_MODES,
  defaultMode: "after",
}).action(async (_opts: unknown, command: Command) => {
  const opts = command.opts<CommonOptions>();
  await runOrExit("puzzle-dial", async () => {
    applyVerbosity(opts);
    const mode = parseDialMode(opts.mode);
    const instructions = await loadInstructions(opts.input);
    log.info(
      `Parsed ${instructions.length} rotations from input file ${opts.input}`
    );

    if (opts.bench) {
      const result = runBenchmark(opts.iterations, () => {
        countZeros(instructions, mode);
      });
      console.log(formatBenchmark(result));
      return;
    }

    const report = runDial(instructions, { input: opts.input, mode });
    printHuman(report);
    await saveReportIfConfigured("dial", report);
  });
});

await program.parseAsync(process.argv);
