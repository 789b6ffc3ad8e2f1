import type { IdStrategy, NewTask, Task, TaskChanges } from "./types";

export const DEFAULT_SEED: readonly Task[] = [
  {
    Id: 1,
    Title: "Complete Lab Activity",
    Description: "Finish Lab Activity 2",
    done: false,
  },
];

export interface TaskStoreOptions {
  /** Initial tasks, in order. Defaults to DEFAULT_SEED. */
  seed?: readonly Task[];
  idStrategy?: IdStrategy;
}

export interface TaskStore {
  readonly idStrategy: IdStrategy;
  size: () => number;
  /** Snapshot of the first task with this Id */
  find: (id: number) => Task | undefined;
  add: (task: NewTask) => Task;
  /** Applies the supplied fields; returns the updated snapshot, or undefined if absent */
  update: (id: number, changes: TaskChanges) => Task | undefined;
  remove: (id: number) => boolean;
}

const snapshot = (task: Task): Task => ({ ...task });

/**
 * Creates an ordered in-memory task store.
 * The store is the only owner of its records; every read hands out a copy.
 */
export function createTaskStore(options: TaskStoreOptions = {}): TaskStore {
  const idStrategy = options.idStrategy ?? "sequential";
  const tasks: Task[] = (options.seed ?? DEFAULT_SEED).map(snapshot);
  let lastId = tasks.reduce((max, task) => Math.max(max, task.Id), 0);

  const nextId = (): number => {
    if (idStrategy === "size") {
      return tasks.length + 1;
    }
    lastId += 1;
    return lastId;
  };

  // Linear scan, first match wins
  const locate = (id: number): number =>
    tasks.findIndex((task) => task.Id === id);

  return {
    idStrategy,

    size: () => tasks.length,

    find(id) {
      const index = locate(id);
      const task = tasks[index];
      return task ? snapshot(task) : undefined;
    },

    add(input) {
      const task: Task = {
        Id: nextId(),
        Title: input.Title,
        Description: input.Description,
        done: input.done,
      };
      tasks.push(task);
      return snapshot(task);
    },

    update(id, changes) {
      const task = tasks[locate(id)];
      if (!task) {
        return undefined;
      }

      if (changes.Title !== undefined && changes.Title !== null) {
        task.Title = changes.Title;
      }
      if (changes.Description !== undefined && changes.Description !== null) {
        task.Description = changes.Description;
      }
      if (changes.done !== undefined && changes.done !== null) {
        task.done = changes.done;
      }

      return snapshot(task);
    },

    remove(id) {
      const index = locate(id);
      if (index === -1) {
        return false;
      }
      tasks.splice(index, 1);
      return true;
    },
  };
}
