import { Err, type ErrResult } from "./result";
import type { ServiceLogger } from "@/logging";
import type { ActionError, ActionErrorCode, ValidationIssue } from "./errors";

/**
 * Parameters for the handleError utility.
 *
 * @property code - Error kind, decides the HTTP status the caller eventually sees
 * @property message - Human-readable error description, returned to the caller as-is
 * @property data - Optional structured data logged alongside the error for debugging
 * @property logger - Logger that records the failure
 * @property atFunction - Name of the calling function for log attribution; auto-inferred from stack trace when omitted
 * @property level - Log level, "error" unless the failure is an expected miss
 */
export interface HandleErrorParams {
  code: ActionErrorCode;
  message: string;
  data?: unknown;
  issues?: ValidationIssue[];
  logger: ServiceLogger;
  atFunction?: string;
  level?: "warn" | "error";
}

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

/**
 * Logs a failure and returns it as a typed Err result.
 * Nothing is swallowed: the caller still receives the error, carrying the log id.
 *
 * @example
 * ```typescript
 * if (!task) {
 *   return handleError({
 *     code: "not_found",
 *     message: `Task with ID ${id} not found`,
 *     logger,
 *     level: "warn",
 *   });
 * }
 * ```
 */
export function handleError(
  params: HandleErrorParams
): ErrResult<ActionError> {
  const atFunction = params.atFunction ?? inferCallerName();
  const level = params.level ?? "error";
  const logId = params.logger[level]({
    atFunction,
    message: params.message,
    data: params.data,
  });

  const error: ActionError = {
    code: params.code,
    message: params.message,
    logId,
  };
  if (params.issues) {
    error.issues = params.issues;
  }

  return Err(error);
}
