import { z } from "zod";

const DECIMAL_INTEGER = /^-?\d+$/;

/**
 * Path ids arrive as strings. Only plain decimal integers are accepted;
 * `0x1`, `1e0`, `+1` or blanks are validation errors, not ids.
 */
export const taskIdSchema = z
  .union([
    z.number(),
    z.string().regex(DECIMAL_INTEGER, "Task ID must be an integer"),
  ])
  .pipe(z.coerce.number<string | number>().int());

export const getTaskSchema = z.object({
  id: taskIdSchema,
});

export const createTaskSchema = z.object({
  Title: z.string().min(1, "Title must not be empty"),
  Description: z.string().nullish(),
  done: z.boolean().default(false),
});

export const updateTaskSchema = z.object({
  id: taskIdSchema,
  Title: z.string().min(1, "Title must not be empty").nullish(),
  Description: z.string().nullish(),
  done: z.boolean().nullish(),
});

export const deleteTaskSchema = z.object({
  id: taskIdSchema,
});
