/**
 * Bootstrap core + server
 */

import "dotenv/config";
import { EventBus } from "./core/eventBus";
import { loadSettings } from "./core/config/settings";
import { initializeLogger, logger } from "./core/logger";
import { createForeman } from "./bootstrap";
import { startServer } from "./server/index";

async function main() {
  const settings = loadSettings();
  const eventBus = new EventBus({
    maxHistorySize: 10000,
    historyRetentionPolicy: "truncate",
  });

  const loggerInstance = initializeLogger(eventBus, {
    level: settings.logLevel,
    format: settings.logFormat,
    file: {
      enabled: settings.logFileEnabled,
      path: settings.logFilePath,
    },
  });

  logger.info("Starting Foreman", {
    model: settings.apiKey ? settings.model : "mock",
    memory: settings.chromaUrl ? "chroma" : "in-memory",
    customToolsPath: settings.customToolsPath,
  });

  const { agent, registry, extensions } = await createForeman(settings, eventBus);
  logger.info("Tools ready", {
    tools: registry.list(),
    extensionsLoaded: extensions.loaded.length,
    extensionsFailed: extensions.failed.length,
  });

  const server = await startServer({
    agent,
    registry,
    logger: loggerInstance.child({ component: "http" }),
    port: settings.port,
  });

  const shutdown = () => {
    logger.info("Shutting down gracefully");
    server.close(() => {
      loggerInstance
        .flush()
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("Failed to flush logs:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
