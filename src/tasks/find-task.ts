import type { ServiceLogger } from "@/logging";
import type { ActionError } from "@/utils/errors";
import { handleError } from "@/utils/handle-error";
import { Ok, type Result } from "@/utils/result";
import type { TaskStore } from "./store";
import type { Task } from "./types";

export const INVALID_ID_MESSAGE = "Task ID must be a positive integer";

export interface TaskActionDeps {
  store: TaskStore;
  logger: ServiceLogger;
}

/**
 * Resolves a task for get/update/delete.
 * A non-positive id is an invalid argument and is rejected before the lookup.
 */
export function findTask(
  id: number,
  deps: TaskActionDeps,
  atFunction: string
): Result<Task, ActionError> {
  const { store, logger } = deps;

  if (id <= 0) {
    return handleError({
      code: "invalid_argument",
      message: INVALID_ID_MESSAGE,
      data: { id },
      logger,
      atFunction,
    });
  }

  logger.info({ atFunction, message: `Searching for task with ID: ${id}` });
  const task = store.find(id);

  if (!task) {
    return handleError({
      code: "not_found",
      message: `Task with ID ${id} not found`,
      logger,
      atFunction,
      level: "warn",
    });
  }

  logger.info({ atFunction, message: "Task found", data: task });
  return Ok(task);
}
