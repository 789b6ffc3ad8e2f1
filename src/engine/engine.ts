import type { ServiceLogger } from "@/logging";
import { createDiagnosticsLog } from "@/utils/diagnostics-log";
import type { ActionError } from "@/utils/errors";
import { Err, Ok, type Result } from "@/utils/result";
import { runHandler, validatePayload } from "./pipeline";
import type {
  Action,
  ActionOutput,
  ActionSummary,
  Engine,
  ServiceSummary,
  Services,
} from "./types";

export type EngineOptions = {
  services: Services;
  logger: ServiceLogger;
  diagnostics?: boolean;
};

const notFound = (message: string): ActionError => ({
  code: "not_found",
  message,
});

export function createEngine(options: EngineOptions): Engine {
  const { services, logger } = options;

  const log = createDiagnosticsLog("Engine", {
    diagnostics: options.diagnostics,
    logger,
  });

  // Lookups are built once on init
  const serviceSummaries: ServiceSummary[] = [];
  const serviceActionsStore: Record<string, ActionSummary[]> = {};
  const actionStore: Record<string, Record<string, Action>> = {};

  for (const service of services) {
    const summaries: ActionSummary[] = [];
    const actions: Record<string, Action> = {};

    for (const action of service.actions) {
      summaries.push({ name: action.name, description: action.description });
      actions[action.name] = action;
    }

    serviceActionsStore[service.name] = summaries;
    actionStore[service.name] = actions;
    serviceSummaries.push({
      name: service.name,
      description: service.description,
      meta: service.meta,
      actions: summaries.map((a) => a.name),
    });
  }

  log(`Initialized with ${services.length} service(s)`);

  // --- Discovery API ---

  const getServices = (): Result<ServiceSummary[], ActionError> =>
    Ok(serviceSummaries);

  const getServiceActions = (
    serviceName: string
  ): Result<ActionSummary[], ActionError> => {
    const actions = serviceActionsStore[serviceName];
    return actions
      ? Ok(actions)
      : Err(notFound(`Service '${serviceName}' not found`));
  };

  const getAction = (
    serviceName: string,
    actionName: string
  ): Result<Action, ActionError> => {
    const serviceMap = actionStore[serviceName];
    if (!serviceMap) {
      return Err(notFound(`Service '${serviceName}' not found`));
    }

    const action = serviceMap[actionName];
    return action
      ? Ok(action)
      : Err(
          notFound(
            `Action '${actionName}' not found in service '${serviceName}'`
          )
        );
  };

  // --- Execution API ---

  /**
   * Resolves the action, validates the payload against its schema and runs the handler.
   * Handlers are synchronous, so an action's reads and writes happen in one event-loop turn.
   */
  const executeAction = async (
    serviceName: string,
    actionName: string,
    payload: unknown
  ): Promise<Result<ActionOutput, ActionError>> => {
    const actionResult = getAction(serviceName, actionName);
    if (actionResult.isErr) {
      return Err(actionResult.error);
    }
    const action = actionResult.value;

    log(`Executing ${serviceName}.${actionName}`);

    const validationResult = validatePayload(action, payload, logger, log);
    if (validationResult.isErr) {
      return Err(validationResult.error);
    }

    return runHandler(action, validationResult.value, logger, log);
  };

  return {
    getServices,
    getServiceActions,
    getAction,
    executeAction,
  };
}
