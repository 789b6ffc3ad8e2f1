import { createLog, type Log, type LoggerConfig } from "./logger";

export type LogInput = Omit<Log, "appName" | "level">;

/** Logger handed to every part of the service. Each call returns the log id. */
export interface ServiceLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * @param appName - The application name (determines log file/directory)
 * @param config - Optional mode, chunking and directory settings
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): ServiceLogger => {
  return {
    info: (input) => createLog({ ...input, appName, level: "info" }, config),
    warn: (input) => createLog({ ...input, appName, level: "warn" }, config),
    error: (input) => createLog({ ...input, appName, level: "error" }, config),
  };
};
