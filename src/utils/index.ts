// biome-ignore lint/performance/noBarrelFile: Public API entry point for utilities
export { createDiagnosticsLog } from "./diagnostics-log";
export type { ActionError, ActionErrorCode, ValidationIssue } from "./errors";
export { type HandleErrorParams, handleError } from "./handle-error";
export { Err, type ErrResult, Ok, type OkResult, type Result } from "./result";
