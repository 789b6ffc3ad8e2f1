import { type Context, Hono } from "hono";
import type { Engine } from "@/engine/types";
import type { ServiceLogger } from "@/logging";
import { TASKS_SERVICE } from "@/tasks/service";
import type { ActionError } from "@/utils/errors";
import { handleError } from "@/utils/handle-error";
import { Ok, type Result } from "@/utils/result";
import { respond } from "./responses";

export const INVALID_BODY_MESSAGE = "Invalid or missing JSON body";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Reads a JSON object body; anything else is a validation error */
async function readJsonObject(
  c: Context,
  logger: ServiceLogger
): Promise<Result<Record<string, unknown>, ActionError>> {
  const body: unknown = await c.req.json().catch(() => null);
  if (isRecord(body)) {
    return Ok(body);
  }

  return handleError({
    code: "validation",
    message: INVALID_BODY_MESSAGE,
    issues: [],
    data: { method: c.req.method, path: c.req.path },
    logger,
    atFunction: "readJsonObject",
    level: "warn",
  });
}

interface CreateTaskRoutesParams {
  engine: Engine;
  logger: ServiceLogger;
  log: (message: string, data?: unknown) => void;
}

/**
 * The task routes, written once and mounted under every API version.
 * Each route only shapes the payload and hands it to the tasks service.
 */
export function createTaskRoutes(params: CreateTaskRoutesParams): Hono {
  const { engine, logger, log } = params;
  const routes = new Hono();

  routes.get("/tasks/:id", async (c) => {
    log(`GET ${c.req.path}`);
    const result = await engine.executeAction(TASKS_SERVICE, "get", {
      id: c.req.param("id"),
    });
    return respond(c, result);
  });

  routes.post("/tasks", async (c) => {
    log(`POST ${c.req.path}`);
    const body = await readJsonObject(c, logger);
    if (body.isErr) {
      return respond(c, body);
    }
    const result = await engine.executeAction(
      TASKS_SERVICE,
      "create",
      body.value
    );
    return respond(c, result, 201);
  });

  routes.patch("/tasks/:id", async (c) => {
    log(`PATCH ${c.req.path}`);
    const body = await readJsonObject(c, logger);
    if (body.isErr) {
      return respond(c, body);
    }
    const result = await engine.executeAction(TASKS_SERVICE, "update", {
      ...body.value,
      id: c.req.param("id"),
    });
    return respond(c, result);
  });

  routes.delete("/tasks/:id", async (c) => {
    log(`DELETE ${c.req.path}`);
    const result = await engine.executeAction(TASKS_SERVICE, "delete", {
      id: c.req.param("id"),
    });
    return respond(c, result);
  });

  return routes;
}
