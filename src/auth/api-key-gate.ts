import { createHash, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { createMiddleware } from "hono/factory";
import type { ServiceLogger } from "@/logging";
import { respond } from "@/rest/responses";
import type { ActionError } from "@/utils/errors";
import { Err, Ok, type Result } from "@/utils/result";
import type { ApiKeyConfig } from "./types";

export const DEFAULT_API_KEY_HEADER = "GLEN_LAB4_api_key";

export const UNAUTHORIZED_MESSAGE = "Unauthorized";

const digest = (value: string): Buffer =>
  createHash("sha256").update(value, "utf8").digest();

/** Compares fixed-length digests so timing does not depend on where the inputs differ */
export function constantTimeEquals(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

/**
 * Checks a presented key against the configured secret.
 * Fails closed: with no secret configured nothing matches, not even a missing header.
 */
export function verifyApiKey(
  presented: string | undefined,
  config: ApiKeyConfig
): Result<true, string> {
  if (!config.secret) {
    return Err("No API key configured");
  }

  if (presented === undefined) {
    return Err(
      `Missing ${config.headerName ?? DEFAULT_API_KEY_HEADER} header`
    );
  }

  if (!constantTimeEquals(presented, config.secret)) {
    return Err("API key mismatch");
  }

  return Ok(true);
}

interface CreateApiKeyGateParams {
  config: ApiKeyConfig;
  logger: ServiceLogger;
}

/**
 * Hono middleware that answers 401 unless the request carries the configured key.
 * Runs before body parsing and before any action.
 */
export function createApiKeyGate(
  params: CreateApiKeyGateParams
): MiddlewareHandler {
  const { config, logger } = params;
  const headerName = config.headerName ?? DEFAULT_API_KEY_HEADER;

  return createMiddleware(async (c, next) => {
    const verdict = verifyApiKey(c.req.header(headerName), config);

    if (verdict.isErr) {
      logger.error({
        atFunction: "apiKeyGate",
        message: "Unauthorized access attempt detected.",
        data: {
          reason: verdict.error,
          method: c.req.method,
          path: c.req.path,
        },
      });
      const error: ActionError = {
        code: "unauthenticated",
        message: UNAUTHORIZED_MESSAGE,
      };
      return respond(c, Err(error));
    }

    logger.info({
      atFunction: "apiKeyGate",
      message: "API key validation successful.",
    });
    await next();
  });
}
