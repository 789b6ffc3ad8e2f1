import { describe, expect, it, vi } from "vitest";
import { DEFAULT_API_KEY_HEADER } from "@/auth/api-key-gate";
import type { ServiceLogger } from "@/logging";
import { createTaskServer } from "../server";
import type { ServerConfig } from "../types";

const createMockLogger = (): ServiceLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-id"),
});

const baseConfig = (overrides?: Partial<ServerConfig>): ServerConfig => ({
  serverName: "TestServer",
  logger: createMockLogger(),
  rest: { allowedOrigins: [], apiKey: { secret: "test-secret" } },
  ...overrides,
});

describe("createTaskServer - initialization", () => {
  it("should return the engine, store and REST app", () => {
    const server = createTaskServer(baseConfig());

    expect(server.config.serverName).toBe("TestServer");
    expect(server.store.size()).toBe(1);
    expect(server.rest.app).toBeDefined();

    const services = server.engine.getServices();
    expect(services.isOk && services.value.map((s) => s.name)).toEqual([
      "tasks",
    ]);
  });

  it("should pass store options through", () => {
    const server = createTaskServer(
      baseConfig({ store: { seed: [], idStrategy: "size" } })
    );
    expect(server.store.size()).toBe(0);
    expect(server.store.idStrategy).toBe("size");
  });

  it("should warn when v2 has no key", () => {
    const logger = createMockLogger();
    createTaskServer(
      baseConfig({ logger, rest: { allowedOrigins: [], apiKey: {} } })
    );
    expect(logger.warn).toHaveBeenCalledWith({
      atFunction: "createTaskServer",
      message: "No API key configured, every v2 request will be rejected",
    });
  });

  it("should report through diagnostics when enabled", () => {
    const logger = createMockLogger();
    createTaskServer(baseConfig({ logger, diagnostics: true }));
    expect(logger.info).toHaveBeenCalledWith({
      atFunction: "TaskServer",
      message: "[TaskServer] TestServer server ready",
      data: undefined,
    });
  });
});

describe("createTaskServer - serving", () => {
  it("should serve both API versions from one store", async () => {
    const server = createTaskServer(baseConfig());
    const { app } = server.rest;

    const created = await app.request("/v2/tasks", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        [DEFAULT_API_KEY_HEADER]: "test-secret",
      },
      body: JSON.stringify({ Title: "Gated" }),
    });
    expect(created.status).toBe(201);
    expect(server.store.find(2)?.Title).toBe("Gated");

    const fetched = await app.request("/v1/tasks/2");
    expect(fetched.status).toBe(200);
  });
});
