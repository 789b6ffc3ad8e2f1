export type Task = {
  Id: number;
  Title: string;
  Description: string | null;
  done: boolean;
};

export type NewTask = Omit<Task, "Id">;

/** Fields a PATCH may carry. `undefined` and `null` both mean "leave unchanged". */
export type TaskChanges = {
  Title?: string | null;
  Description?: string | null;
  done?: boolean | null;
};

/**
 * - `sequential`: strictly monotonic, never reuses an Id
 * - `size`: legacy `count + 1`, may repeat an Id after a delete
 */
export type IdStrategy = "sequential" | "size";

// --- Response bodies ---

export type TaskFoundBody = { Status: string; Task: Task };

export type TaskAddedBody = { Status: string; "Task Added": Task };

export type TaskMessageBody = { Status: string; Message: string };
