import "dotenv/config";
import { z } from "zod";

const schema = z.object({
  DATA_DIR: z.string().default("data"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("error"),
  BENCH_ITERATIONS: z.coerce.number().int().min(1).default(1000),
  // when set, every run also writes a JSON report into this folder
  REPORT_FOLDER: z.string().trim().min(1).optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  return schema.parse(env);
}

export const cfg: AppConfig = loadConfig(process.env);
