import { describe, expect, it, vi } from "vitest";
import { createEngine } from "@/engine/engine";
import type { ServiceLogger } from "@/logging";
import { createTasksService, TASKS_SERVICE } from "../service";
import { createTaskStore, type TaskStoreOptions } from "../store";

const createMockLogger = (): ServiceLogger => ({
  info: vi.fn(() => "info-id"),
  warn: vi.fn(() => "warn-id"),
  error: vi.fn(() => "error-id"),
});

function setup(options?: TaskStoreOptions) {
  const logger = createMockLogger();
  const store = createTaskStore(options);
  const engine = createEngine({
    services: [createTasksService({ store, logger })],
    logger,
  });
  const run = (action: string, payload: unknown) =>
    engine.executeAction(TASKS_SERVICE, action, payload);
  return { logger, store, run };
}

describe("tasks.get", () => {
  it("should return the task", async () => {
    const { run } = setup();
    const result = await run("get", { id: "1" });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({
        Status: "Success",
        Task: {
          Id: 1,
          Title: "Complete Lab Activity",
          Description: "Finish Lab Activity 2",
          done: false,
        },
      });
    }
  });

  it.each(["0", "-5"])("should reject id %s as an invalid argument", async (id) => {
    const { run, logger } = setup();
    const result = await run("get", { id });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.code).toBe("invalid_argument");
      expect(result.error.message).toBe("Task ID must be a positive integer");
    }
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("should report a missing task as not_found", async () => {
    const { run, logger } = setup();
    const result = await run("get", { id: "3" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.code).toBe("not_found");
      expect(result.error.message).toBe("Task with ID 3 not found");
    }
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("should reject a non-integer id as a validation error", async () => {
    const { run } = setup();
    const result = await run("get", { id: "abc" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.code).toBe("validation");
      expect(result.error.issues?.[0]?.path).toBe("id");
    }
  });
});

describe("tasks.create", () => {
  it("should apply defaults for omitted fields", async () => {
    const { run } = setup();
    const result = await run("create", { Title: "Write spec" });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({
        Status: "Success",
        "Task Added": {
          Id: 2,
          Title: "Write spec",
          Description: null,
          done: false,
        },
      });
    }
  });

  it("should store exactly what was supplied", async () => {
    const { run } = setup();
    await run("create", { Title: "Ship", Description: "v2 gate", done: true });
    const result = await run("get", { id: 2 });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value.Task).toEqual({
        Id: 2,
        Title: "Ship",
        Description: "v2 gate",
        done: true,
      });
    }
  });

  it.each([{}, { Title: "" }, { Title: 5 }])(
    "should reject %j as a validation error",
    async (payload) => {
      const { run, store } = setup();
      const result = await run("create", payload);

      expect(result.isErr).toBe(true);
      if (result.isErr) {
        expect(result.error.code).toBe("validation");
        expect(result.error.issues?.[0]?.path).toBe("Title");
      }
      expect(store.size()).toBe(1);
    }
  );
});

describe("tasks.update", () => {
  it("should change only done when only done is supplied", async () => {
    const { run, store } = setup();
    const result = await run("update", { id: "1", done: true });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value).toEqual({
        Status: "Success",
        Message: "Task Updated Successfully",
      });
    }
    expect(store.find(1)).toEqual({
      Id: 1,
      Title: "Complete Lab Activity",
      Description: "Finish Lab Activity 2",
      done: true,
    });
  });

  it("should succeed as a no-op when no fields are supplied", async () => {
    const { run, store } = setup();
    const before = store.find(1);
    const result = await run("update", { id: "1" });

    expect(result.isOk).toBe(true);
    expect(store.find(1)).toEqual(before);
  });

  it("should reject an empty Title", async () => {
    const { run } = setup();
    const result = await run("update", { id: "1", Title: "" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error.code).toBe("validation");
    }
  });

  it("should check the id before anything else", async () => {
    const { run } = setup();
    const invalid = await run("update", { id: "0", done: true });
    const missing = await run("update", { id: "8", done: true });

    expect(invalid.isErr && invalid.error.code).toBe("invalid_argument");
    expect(missing.isErr && missing.error.code).toBe("not_found");
  });
});

describe("tasks.delete", () => {
  it("should delete and then report not_found", async () => {
    const { run } = setup();
    const deleted = await run("delete", { id: "1" });

    expect(deleted.isOk).toBe(true);
    if (deleted.isOk) {
      expect(deleted.value).toEqual({
        Status: "Success",
        Message: "Task with ID 1 deleted",
      });
    }

    const lookup = await run("get", { id: "1" });
    expect(lookup.isErr && lookup.error.code).toBe("not_found");
  });

  it("should reject a non-positive id", async () => {
    const { run } = setup();
    const result = await run("delete", { id: "-1" });
    expect(result.isErr && result.error.code).toBe("invalid_argument");
  });
});

describe("Id assignment", () => {
  it("should keep Ids unique across deletes by default", async () => {
    const { run } = setup();
    await run("create", { Title: "two" });
    await run("delete", { id: "1" });
    const result = await run("create", { Title: "three" });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value["Task Added"]).toMatchObject({ Id: 3 });
    }
  });

  it("should reproduce count + 1 with the size strategy", async () => {
    const { run } = setup({ idStrategy: "size" });
    await run("create", { Title: "two" });
    await run("delete", { id: "1" });
    const result = await run("create", { Title: "again two" });

    expect(result.isOk).toBe(true);
    if (result.isOk) {
      expect(result.value["Task Added"]).toMatchObject({ Id: 2 });
    }
  });
});
