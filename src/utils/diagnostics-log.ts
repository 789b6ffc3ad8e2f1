import type { ServiceLogger } from "@/logging";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: ServiceLogger;
}

/**
 * Creates a prefixed diagnostics log function for service internals.
 * Writes through the service logger when one is given, falls back to console.log,
 * and does nothing unless diagnostics are enabled.
 *
 * @param prefix - Component identifier e.g. "TaskServer", "REST", "Engine"
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  if (!params.diagnostics) {
    // biome-ignore lint/suspicious/noEmptyBlockStatements: intentional no-op when diagnostics disabled
    return () => {};
  }

  const { logger } = params;

  return (message: string, data?: unknown) => {
    if (!logger) {
      console.log(`[${prefix}] ${message}`, data ?? "");
      return;
    }

    logger.info({
      atFunction: prefix,
      message: `[${prefix}] ${message}`,
      data,
    });
  };
}
