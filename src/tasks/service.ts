import { createActions } from "@/engine/create-action";
import { createService } from "@/engine/create-service";
import type { Service } from "@/engine/types";
import { createCreateTaskAction } from "./create";
import { createDeleteTaskAction } from "./delete";
import type { TaskActionDeps } from "./find-task";
import { createGetTaskAction } from "./get";
import { createUpdateTaskAction } from "./update";

export const TASKS_SERVICE = "tasks";

/**
 * The single operation set behind both API versions.
 * Actions close over the store handle they are given.
 */
export function createTasksService(deps: TaskActionDeps): Service {
  return createService({
    name: TASKS_SERVICE,
    description: "Task management with CRUD operations",
    actions: createActions([
      createGetTaskAction(deps),
      createCreateTaskAction(deps),
      createUpdateTaskAction(deps),
      createDeleteTaskAction(deps),
    ]),
  });
}
