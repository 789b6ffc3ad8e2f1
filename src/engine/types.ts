import type { z } from "zod";
import type { ActionError } from "@/utils/errors";
import type { Result } from "@/utils/result";

/** Every action answers with a JSON object */
export type ActionOutput = Record<string, unknown>;

export interface Action<
  TSchema extends z.ZodType = z.ZodType,
  TOutput extends ActionOutput = ActionOutput,
> {
  name: string;
  description: string;
  /** Payloads are parsed with this schema before the handler sees them */
  validation: TSchema;
  handler(data: z.output<TSchema>): Result<TOutput, ActionError>;
  meta?: Record<string, unknown>;
}

export type Actions = Action[];

export type Service = {
  name: string;
  description: string;
  actions: Action[];
  meta?: Record<string, unknown>;
};

export type Services = Service[];

export type ServiceSummary = {
  name: string;
  description: string;
  meta?: Record<string, unknown>;
  actions: string[];
};

export type ActionSummary = {
  name: string;
  description: string;
};

export interface Engine {
  getServices: () => Result<ServiceSummary[], ActionError>;
  getServiceActions: (
    serviceName: string
  ) => Result<ActionSummary[], ActionError>;
  getAction: (
    serviceName: string,
    actionName: string
  ) => Result<Action, ActionError>;
  executeAction: (
    serviceName: string,
    actionName: string,
    payload: unknown
  ) => Promise<Result<ActionOutput, ActionError>>;
}
