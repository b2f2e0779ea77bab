import { fileURLToPath } from "node:url";

export const SAMPLE_RANGES = fileURLToPath(
  new URL("../../data/day02/sample.txt", import.meta.url)
);
