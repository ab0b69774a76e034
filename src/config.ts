import path from "node:path";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  DATA_DIR: z.string().default("./data"),
  DIRECTORY_FILE: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export interface Config {
  port: number;
  dataDir: string;
  directoryFile: string;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // unset and blank variables both fall back to defaults
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const e = EnvSchema.parse(present);

  const dataDir = path.resolve(e.DATA_DIR);
  return {
    port: e.PORT,
    dataDir,
    directoryFile: e.DIRECTORY_FILE ? path.resolve(e.DIRECTORY_FILE) : path.join(dataDir, "approvers.json"),
    logLevel: e.LOG_LEVEL
  };
}
