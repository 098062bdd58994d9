/**
 * Shared CLI wiring: settings, event bus, stderr logger, agent.
 */

import { EventBus } from "../../core/eventBus";
import { loadSettings } from "../../core/config/settings";
import { ForemanLogger, initializeLogger } from "../../core/logger";
import { Foreman, createForeman } from "../../bootstrap";

export interface CliContext {
  foreman: Foreman;
  logger: ForemanLogger;
}

export async function setupCli(): Promise<CliContext> {
  const settings = loadSettings();
  const eventBus = new EventBus();
  const logger = initializeLogger(eventBus, {
    level: settings.logLevel,
    format: settings.logFormat,
    stream: "stderr",
    file: { enabled: settings.logFileEnabled, path: settings.logFilePath },
  });

  const foreman = await createForeman(settings, eventBus);
  return { foreman, logger };
}
