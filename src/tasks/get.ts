import { createAction } from "@/engine/create-action";
import type { ActionError } from "@/utils/errors";
import { Err, Ok, type Result } from "@/utils/result";
import { findTask, type TaskActionDeps } from "./find-task";
import { getTaskSchema } from "./schemas";
import type { TaskFoundBody } from "./types";

export const createGetTaskAction = (deps: TaskActionDeps) =>
  createAction({
    name: "get",
    description: "Get a task by ID",
    validation: getTaskSchema,
    handler: ({ id }): Result<TaskFoundBody, ActionError> => {
      const found = findTask(id, deps, "getTask");
      if (found.isErr) {
        return Err(found.error);
      }
      return Ok({ Status: "Success", Task: found.value });
    },
  });
