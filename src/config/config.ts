import { existsSync, readFileSync } from "node:fs";
import { parse } from "dotenv";
import { prettifyError, z } from "zod";
import type { LogChunking, LogMode } from "@/logging";
import type { IdStrategy } from "@/tasks/types";
import { Err, Ok, type Result } from "@/utils/result";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  LAB4_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  HOST: z.string().min(1).default("localhost"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  MODE: z.enum(["dev", "prod", "test", "agentic"]).default("dev"),
  LOG_CHUNKING: z.enum(["none", "daily", "monthly"]).default("none"),
  TASK_ID_STRATEGY: z.enum(["sequential", "size"]).default("sequential"),
  CORS_ORIGINS: z.string().default(""),
  DIAGNOSTICS: z.enum(["true", "false"]).default("false"),
});

type Env = Record<string, string | undefined>;

export const DEFAULT_ENV_FILE = ".env";

/**
 * Merges a dotenv file under the given environment. Variables already set
 * win over the file; a missing file leaves the environment as it is.
 */
export function readEnvFile(
  path: string = DEFAULT_ENV_FILE,
  env: Env = process.env
): Env {
  if (!existsSync(path)) {
    return { ...env };
  }
  return { ...parse(readFileSync(path)), ...env };
}

export interface AppConfig {
  /** v2 shared secret; undefined means v2 is closed */
  apiKey?: string;
  host: string;
  port: number;
  mode: LogMode;
  logChunking: LogChunking;
  idStrategy: IdStrategy;
  allowedOrigins: string[];
  diagnostics: boolean;
}

/**
 * Reads the service configuration once, at startup.
 * Returns Err with every invalid variable listed when the environment is malformed.
 */
export function loadConfig(
  env: Env = process.env
): Result<AppConfig, string> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return Err(
      `Invalid environment configuration:\n${prettifyError(parsed.error)}`
    );
  }

  const vars = parsed.data;
  return Ok({
    apiKey: vars.LAB4_API_KEY,
    host: vars.HOST,
    port: vars.PORT,
    mode: vars.MODE,
    logChunking: vars.LOG_CHUNKING,
    idStrategy: vars.TASK_ID_STRATEGY,
    allowedOrigins: vars.CORS_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    diagnostics: vars.DIAGNOSTICS === "true",
  });
}
