#!/usr/bin/env node
import type { Command } from "commander";
import { tallyRanges } from "../ids/aggregator.js";
import { loadIdRanges, parseMode } from "../ids/parser.js";
import { printHuman, printTotals } from "../ids/report.js";
import { runIds } from "../ids/runner.js";
import { MODES } from "../ids/types.js";
import { formatBenchmark, runBenchmark } from "../util/bench.js";
import { log } from "../util/logger.js";
import {
  applyVerbosity,
  type CommonOptions,
  parsePositiveInt,
  runOrExit,
  saveReportIfConfigured,
  solverProgram,
} from "./common.js";

type IdsOptions = CommonOptions & {
  chunk?: number;
  report: boolean;
};

const program = solverProgram({
  name: "puzzle-ids",
  description:
    "Counts and sums the IDs made of one repeated block of digits in a list of ID ranges",
  day: "day02",
  modes: MODES,
  defaultMode: "two",
})
  .option(
    "--chunk <n>",
    "Tally ranges in chunks of at most n IDs",
    parsePositiveInt
  )
  .option("--report", "Print the per-range table", false)
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.opts<IdsOptions>();
    await runOrExit("puzzle-ids", async () => {
      applyVerbosity(opts);
      const mode = parseMode(opts.mode);
      const ranges = await loadIdRanges(opts.input);
      log.info(
        `Parsed ${ranges.length} ID ranges from input file ${opts.input}`
      );

      if (opts.bench) {
        const result = runBenchmark(opts.iterations, () => {
          tallyRanges(ranges, mode, {}, opts.chunk);
        });
        console.log(formatBenchmark(result));
        return;
      }

      const report = runIds(ranges, {
        input: opts.input,
        mode,
        chunkSize: opts.chunk,
      });
      if (opts.report) printHuman(report);
      else printTotals(report.total);
      await saveReportIfConfigured("ids", report);
    });
  });

await program.parseAsync(process.argv);
