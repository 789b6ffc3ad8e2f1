import type { z } from "zod";
import type { Action, ActionOutput } from "./types";

/**
 * Typed identity for defining a single action with full type inference.
 * The handler's data is typed from the validation schema's output.
 */
export function createAction<
  TSchema extends z.ZodType,
  TOutput extends ActionOutput,
>(config: Action<TSchema, TOutput>): Action<TSchema, TOutput> {
  return config;
}

/** Typed identity for defining multiple actions. */
export function createActions(configs: Action[]): Action[] {
  return configs;
}
