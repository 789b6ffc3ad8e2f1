import type { Context } from "hono";
import type { ActionOutput } from "@/engine/types";
import type { ActionError, ActionErrorCode } from "@/utils/errors";
import type { Result } from "@/utils/result";
import type { ErrorBody, ErrorStatus } from "./types";

export const STATUS_BY_CODE: Record<ActionErrorCode, ErrorStatus> = {
  invalid_argument: 400,
  unauthenticated: 401,
  not_found: 404,
  validation: 422,
  internal: 500,
};

const INTERNAL_DETAIL = "Internal Server Error";

/** Internal failure details stay in the logs, never in the response */
export function toErrorBody(error: ActionError): ErrorBody {
  if (error.code === "internal") {
    return { detail: INTERNAL_DETAIL };
  }
  if (error.code === "validation") {
    return { detail: error.message, errors: error.issues ?? [] };
  }
  return { detail: error.message };
}

/**
 * The single point where an action Result crosses into an HTTP response.
 */
export function respond(
  c: Context,
  result: Result<ActionOutput, ActionError>,
  successStatus: 200 | 201 = 200
) {
  if (result.isErr) {
    return c.json(toErrorBody(result.error), STATUS_BY_CODE[result.error.code]);
  }
  return c.json(result.value, successStatus);
}
