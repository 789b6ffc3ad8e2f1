import { createAction } from "@/engine/create-action";
import type { ActionError } from "@/utils/errors";
import { Err, Ok, type Result } from "@/utils/result";
import { findTask, type TaskActionDeps } from "./find-task";
import { updateTaskSchema } from "./schemas";
import type { TaskMessageBody } from "./types";

export const createUpdateTaskAction = (deps: TaskActionDeps) =>
  createAction({
    name: "update",
    description: "Update the supplied fields of a task",
    validation: updateTaskSchema,
    handler: ({ id, ...changes }): Result<TaskMessageBody, ActionError> => {
      const found = findTask(id, deps, "updateTask");
      if (found.isErr) {
        return Err(found.error);
      }

      const updated = deps.store.update(id, changes);
      deps.logger.info({
        atFunction: "updateTask",
        message: "Task updated successfully",
        data: updated,
      });

      return Ok({ Status: "Success", Message: "Task Updated Successfully" });
    },
  });
