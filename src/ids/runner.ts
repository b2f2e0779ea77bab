import { timed } from "../report/format.js";
import { log } from "../util/logger.js";
import { tallyRanges, type TallyObserver } from "./aggregator.js";
import { invalidBlockCount } from "./classifier.js";
import { formatIdRange } from "./parser.js";
import type { IdsReport } from "./report.js";
import type { IdRange, Mode, RangeTally } from "./types.js";

export interface IdsRunOptions {
  input: string;
  mode: Mode;
  chunkSize?: number;
}

export function runIds(
  ranges: readonly IdRange[],
  opts: IdsRunOptions
): IdsReport {
  const rows: RangeTally[] = [];
  const observer: TallyObserver = {
    onRange: (row) => {
      rows.push(row);
      log.info(`- ${formatIdRange(row.range)} has ${row.count} invalid IDs`);
    },
  };
  // checked once, the per-id hook stays off the hot path otherwise
  if (log.isLevelEnabled("debug")) {
    observer.onInvalid = (id, range) =>
      log.debug(
        {
          id: id.toString(),
          range: formatIdRange(range),
          blocks: invalidBlockCount(id, opts.mode),
        },
        "invalid id"
      );
  }

  const { value: total, ...times } = timed(() =>
    tallyRanges(ranges, opts.mode, observer, opts.chunkSize)
  );

  return {
    input: opts.input,
    mode: opts.mode,
    chunkSize: opts.chunkSize,
    ranges: rows,
    total,
    ...times,
  };
}
