import { createAction } from "@/engine/create-action";
import type { ActionError } from "@/utils/errors";
import { Err, Ok, type Result } from "@/utils/result";
import { findTask, type TaskActionDeps } from "./find-task";
import { deleteTaskSchema } from "./schemas";
import type { TaskMessageBody } from "./types";

export const createDeleteTaskAction = (deps: TaskActionDeps) =>
  createAction({
    name: "delete",
    description: "Delete a task by ID",
    validation: deleteTaskSchema,
    handler: ({ id }): Result<TaskMessageBody, ActionError> => {
      const found = findTask(id, deps, "deleteTask");
      if (found.isErr) {
        return Err(found.error);
      }

      deps.store.remove(id);
      deps.logger.info({
        atFunction: "deleteTask",
        message: `Task with ID ${id} deleted successfully`,
      });

      return Ok({ Status: "Success", Message: `Task with ID ${id} deleted` });
    },
  });
