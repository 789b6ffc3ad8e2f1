import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { nanoid } from "nanoid";
import pino, { type Logger, type LoggerOptions } from "pino";

export type LogLevel = "info" | "warn" | "error";

/**
 * - `prod`: NDJSON through a pino file transport
 * - `test`: the same NDJSON, appended synchronously so files exist immediately
 * - `agentic`: nothing is written, the JSON record is returned in place of the id
 * - `dev`: pino to stdout
 */
export type LogMode = "dev" | "prod" | "test" | "agentic";

export type LogChunking = "daily" | "monthly" | "none";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

/** Configuration for where and how log records are written */
export interface LoggerConfig {
  /** Falls back to the MODE environment variable, then "dev" */
  mode?: LogMode;
  /** Time-based chunking strategy. Default: 'none' (single file per app) */
  chunking?: LogChunking;
  /** Directory that holds log files. Default: ./logs under the working directory */
  logDir?: string;
}

const LOG_MODES: readonly LogMode[] = ["dev", "prod", "test", "agentic"];

const isLogMode = (value: string | undefined): value is LogMode =>
  LOG_MODES.some((mode) => mode === value);

const resolveMode = (config?: LoggerConfig): LogMode => {
  if (config?.mode) {
    return config.mode;
  }
  const fromEnv = process.env.MODE;
  return isLogMode(fromEnv) ? fromEnv : "dev";
};

const defaultLogDir = () => join(process.cwd(), "logs");

/**
 * Resolves the log file path for an app.
 * - 'none' (default): {logDir}/{appName}.log
 * - 'monthly': {logDir}/{appName}/YYYY-MM.log
 * - 'daily': {logDir}/{appName}/YYYY-MM-DD.log
 */
export function resolveLogPath(
  appName: string,
  config?: LoggerConfig,
  now: Date = new Date()
): string {
  const logDir = config?.logDir ?? defaultLogDir();
  const chunking = config?.chunking ?? "none";

  if (chunking === "none") {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    return join(logDir, `${appName}.log`);
  }

  const appDir = join(logDir, appName);
  if (!existsSync(appDir)) {
    mkdirSync(appDir, { recursive: true });
  }

  return join(appDir, `${formatChunkName(now, chunking)}.log`);
}

/** Formats a date into a chunk filename (without extension) */
export function formatChunkName(
  date: Date,
  chunking: "monthly" | "daily"
): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");

  if (chunking === "monthly") {
    return `${year}-${month}`;
  }

  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

const pinoOptions: LoggerOptions = {
  base: null,
  timestamp: false,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

// pino transports spawn a worker per destination, so one logger per file
const fileLoggers = new Map<string, Logger>();
let stdoutLogger: Logger | null = null;

function getFileLogger(logFile: string): Logger {
  const cached = fileLoggers.get(logFile);
  if (cached) {
    return cached;
  }

  const transport = pino.transport({
    targets: [
      {
        level: "info",
        target: "pino/file",
        options: { destination: logFile, mkdir: true },
      },
    ],
  });

  const logger = pino(pinoOptions, transport);
  fileLoggers.set(logFile, logger);
  return logger;
}

function getStdoutLogger(): Logger {
  if (!stdoutLogger) {
    stdoutLogger = pino(pinoOptions);
  }
  return stdoutLogger;
}

/**
 * Writes a log record and returns its id.
 * In agentic mode the serialized record itself is returned.
 * @throws {Error} If appName is missing in the log object
 */
export const createLog = (log: Log, config?: LoggerConfig): string => {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  const logRecord = {
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
    level,
    time: new Date().toISOString(),
  };

  const mode = resolveMode(config);

  if (mode === "agentic") {
    return JSON.stringify(logRecord);
  }

  if (mode === "test") {
    const logFile = resolveLogPath(log.appName, config);
    appendFileSync(logFile, `${JSON.stringify(logRecord)}\n`, "utf-8");
    return log_id;
  }

  const { level: _level, ...fields } = logRecord;
  const target =
    mode === "prod"
      ? getFileLogger(resolveLogPath(log.appName, config))
      : getStdoutLogger();
  target[level](fields);

  return log_id;
};
