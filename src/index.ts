// Auth gate: shared-secret header check for the v2 routes
export {
  constantTimeEquals,
  createApiKeyGate,
  DEFAULT_API_KEY_HEADER,
  verifyApiKey,
} from "./auth/api-key-gate";
export type { ApiKeyConfig } from "./auth/types";
// Configuration: environment parsing
export { type AppConfig, loadConfig } from "./config/config";
export type { CorsConfig, CorsOptions } from "./cors/types";
// Engine: action registry and execution
export { createAction, createActions } from "./engine/create-action";
export { createService } from "./engine/create-service";
export { createEngine, type EngineOptions } from "./engine/engine";
export type {
  Action,
  ActionOutput,
  ActionSummary,
  Engine,
  Service,
  ServiceSummary,
  Services,
} from "./engine/types";
// Logging
export {
  createLog,
  createLogger,
  type Log,
  type LoggerConfig,
  type ServiceLogger,
} from "./logging";
export { createRestApp } from "./rest/rest";
export type { ErrorBody, RestConfig } from "./rest/types";
// Server factory: the main entry point
export { createTaskServer, startTaskServer } from "./server/server";
export type { ServerConfig, TaskServer } from "./server/types";
// Tasks: store and the service shared by both API versions
export { createTasksService, TASKS_SERVICE } from "./tasks/service";
export {
  createTaskStore,
  DEFAULT_SEED,
  type TaskStore,
  type TaskStoreOptions,
} from "./tasks/store";
export type { IdStrategy, Task, TaskChanges } from "./tasks/types";
// Utilities: error handling and diagnostics
export {
  type ActionError,
  type ActionErrorCode,
  Err,
  handleError,
  Ok,
  type Result,
} from "./utils";
