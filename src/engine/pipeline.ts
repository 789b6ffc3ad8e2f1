import { prettifyError, type z } from "zod";
import type { ServiceLogger } from "@/logging";
import type { ActionError, ValidationIssue } from "@/utils/errors";
import { handleError } from "@/utils/handle-error";
import { Ok, type Result } from "@/utils/result";
import type { Action, ActionOutput } from "./types";

/** Flattens zod issues to dotted paths, "" for the payload root */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
}

/**
 * Validate payload against the action's zod schema
 */
export function validatePayload(
  action: Action,
  payload: unknown,
  logger: ServiceLogger,
  log: (msg: string, data?: unknown) => void
): Result<unknown, ActionError> {
  const parseResult = action.validation.safeParse(payload);
  if (!parseResult.success) {
    const validationError = prettifyError(parseResult.error);
    log(`Validation failed for ${action.name}`, validationError);
    return handleError({
      code: "validation",
      message: `Validation failed: ${validationError}`,
      issues: toValidationIssues(parseResult.error),
      data: { payload },
      logger,
      atFunction: action.name,
      level: "warn",
    });
  }

  return Ok(parseResult.data);
}

/**
 * Execute the main action handler. A thrown exception becomes an internal error.
 */
export function runHandler(
  action: Action,
  data: unknown,
  logger: ServiceLogger,
  log: (msg: string, data?: unknown) => void
): Result<ActionOutput, ActionError> {
  try {
    return action.handler(data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`Handler failed for ${action.name}`, message);
    return handleError({
      code: "internal",
      message: `Action '${action.name}' failed: ${message}`,
      logger,
      atFunction: action.name,
    });
  }
}
