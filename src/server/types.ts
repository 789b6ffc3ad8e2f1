import type { Hono } from "hono";
import type { Engine } from "@/engine/types";
import type { ServiceLogger } from "@/logging";
import type { RestConfig } from "@/rest/types";
import type { TaskStore, TaskStoreOptions } from "@/tasks/store";

export interface ServerConfig {
  serverName: string;
  diagnostics?: boolean;
  logger: ServiceLogger;
  /** Seed and Id strategy of the in-memory store */
  store?: TaskStoreOptions;
  rest: RestConfig;
}

export interface TaskServer {
  config: ServerConfig;
  engine: Engine;
  store: TaskStore;
  rest: { app: Hono; config: RestConfig };
}
