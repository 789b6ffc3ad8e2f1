import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import { createApiKeyGate } from "@/auth/api-key-gate";
import { applyCorsConfig } from "@/cors/cors";
import type { Action, Engine } from "@/engine/types";
import type { ServiceLogger } from "@/logging";
import { TASKS_SERVICE } from "@/tasks/service";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import { createTaskRoutes } from "./routes";
import type { ErrorBody, RestConfig } from "./types";

interface CreateRestAppParams {
  config: RestConfig;
  engine: Engine;
  logger: ServiceLogger;
  serverName: string;
}

/** Records every request a version family receives */
const logRequests =
  (version: string, logger: ServiceLogger): MiddlewareHandler =>
  async (c, next) => {
    logger.info({
      atFunction: "restApp",
      message: `${c.req.method} request received (${version}) for ${c.req.path}`,
    });
    await next();
  };

/**
 * Extracts JSON schema from an action's zod validation, returns null on failure
 */
function extractActionSchema(action: Action): unknown {
  try {
    return z.toJSONSchema(action.validation, {
      unrepresentable: "any",
      io: "input",
    });
  } catch {
    return null;
  }
}

/**
 * Creates the Hono app serving the task API.
 *
 * The same task routes are mounted twice: under /v1 as-is and under /v2
 * behind the API key gate. Both reach the one tasks service in the engine.
 */
export function createRestApp(params: CreateRestAppParams): Hono {
  const { config, engine, logger, serverName } = params;
  const app = new Hono();

  const log = createDiagnosticsLog("REST", {
    diagnostics: config.diagnostics,
    logger,
  });

  // CORS first, so preflight requests never reach the gate
  applyCorsConfig(app, config);

  const taskRoutes = createTaskRoutes({ engine, logger, log });

  app.use("/v1/*", logRequests("v1", logger));
  app.route("/v1", taskRoutes);

  app.use("/v2/*", logRequests("v2", logger));
  app.use("/v2/*", createApiKeyGate({ config: config.apiKey, logger }));
  app.route("/v2", taskRoutes);

  if (config.enableStatus ?? true) {
    app.get("/status", (c) =>
      c.json({ Status: "Success", Message: `${serverName} is running` })
    );
  }

  if (config.enableSchema ?? true) {
    app.get("/schema", (c) => {
      const schemas: Record<string, unknown> = {};
      const actionsResult = engine.getServiceActions(TASKS_SERVICE);

      if (actionsResult.isOk) {
        for (const summary of actionsResult.value) {
          const actionResult = engine.getAction(TASKS_SERVICE, summary.name);
          if (actionResult.isOk) {
            schemas[summary.name] = extractActionSchema(actionResult.value);
          }
        }
      }

      return c.json({ Status: "Success", Schemas: schemas });
    });
  }

  app.notFound((c) =>
    c.json({ detail: "Not Found" } satisfies ErrorBody, 404)
  );

  app.onError((error, c) => {
    logger.error({
      atFunction: "restApp",
      message: `Unhandled error on ${c.req.method} ${c.req.path}`,
      data: { error: error.message },
    });
    return c.json({ detail: "Internal Server Error" } satisfies ErrorBody, 500);
  });

  log("REST interface ready at /v1/tasks and /v2/tasks");

  return app;
}
