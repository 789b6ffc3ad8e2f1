import { createAction } from "@/engine/create-action";
import type { ActionError } from "@/utils/errors";
import { Ok, type Result } from "@/utils/result";
import type { TaskActionDeps } from "./find-task";
import { createTaskSchema } from "./schemas";
import type { TaskAddedBody } from "./types";

export const createCreateTaskAction = ({ store, logger }: TaskActionDeps) =>
  createAction({
    name: "create",
    description: "Add a new task",
    validation: createTaskSchema,
    handler: (data): Result<TaskAddedBody, ActionError> => {
      const task = store.add({
        Title: data.Title,
        Description: data.Description ?? null,
        done: data.done,
      });

      logger.info({
        atFunction: "createTask",
        message: "Task added successfully",
        data: task,
      });

      return Ok({ Status: "Success", "Task Added": task });
    },
  });
