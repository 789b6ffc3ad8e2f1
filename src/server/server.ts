import { serve } from "@hono/node-server";
import { createEngine } from "@/engine/engine";
import { createRestApp } from "@/rest/rest";
import { createTasksService } from "@/tasks/service";
import { createTaskStore } from "@/tasks/store";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import type { ServerConfig, TaskServer } from "./types";

/**
 * Bootstraps a task server.
 *
 * Wires the store, the tasks service, the action engine and the REST app.
 * Nothing is global: every piece receives the handles it works on.
 *
 * @param config - Server configuration including logger, store options and REST options
 * @returns A TaskServer holding the engine, the store and the Hono app
 */
export function createTaskServer(config: ServerConfig): TaskServer {
  const { logger } = config;
  const log = createDiagnosticsLog("TaskServer", {
    diagnostics: config.diagnostics,
    logger,
  });

  const store = createTaskStore(config.store);
  log(
    `Store ready with ${store.size()} task(s), id strategy '${store.idStrategy}'`
  );

  const engine = createEngine({
    services: [createTasksService({ store, logger })],
    logger,
    diagnostics: config.diagnostics,
  });

  const app = createRestApp({
    config: config.rest,
    engine,
    logger,
    serverName: config.serverName,
  });

  if (!config.rest.apiKey.secret) {
    logger.warn({
      atFunction: "createTaskServer",
      message: "No API key configured, every v2 request will be rejected",
    });
  }

  log(`${config.serverName} server ready`);

  return {
    config,
    engine,
    store,
    rest: { app, config: config.rest },
  };
}

/**
 * Starts listening on the configured host and port with the Node.js adapter.
 * @returns The underlying Node.js server, for shutdown
 */
export function startTaskServer(server: TaskServer) {
  const { app, config } = server.rest;
  const hostname = config.host ?? "localhost";
  const port = config.port ?? 8000;

  return serve({ fetch: app.fetch, hostname, port }, (info) => {
    server.config.logger.info({
      atFunction: "startTaskServer",
      message: `${server.config.serverName} listening on http://${hostname}:${info.port}`,
    });
  });
}
