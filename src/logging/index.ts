// biome-ignore lint/performance/noBarrelFile: Public API entry point for logging module
export { createLogger, type LogInput, type ServiceLogger } from "./create-log";
export {
  createLog,
  formatChunkName,
  type Log,
  type LogChunking,
  type LoggerConfig,
  type LogLevel,
  type LogMode,
  resolveLogPath,
} from "./logger";
