import { loadConfig, readEnvFile } from "@/config/config";
import { createLogger } from "@/logging";
import { createTaskServer, startTaskServer } from "@/server/server";

function main(): void {
  const configResult = loadConfig(readEnvFile());
  if (configResult.isErr) {
    console.error(configResult.error);
    process.exitCode = 1;
    return;
  }

  const config = configResult.value;

  const logger = createLogger("task-gate", {
    mode: config.mode,
    chunking: config.logChunking,
  });

  const server = createTaskServer({
    serverName: "task-gate",
    diagnostics: config.diagnostics,
    logger,
    store: { idStrategy: config.idStrategy },
    rest: {
      host: config.host,
      port: config.port,
      diagnostics: config.diagnostics,
      allowedOrigins: config.allowedOrigins,
      apiKey: { secret: config.apiKey },
    },
  });

  startTaskServer(server);
}

main();
