import pino, { type Logger } from "pino";

import type { Settings } from "../config/settings.js";
import { createChatModel } from "../integrations/gemini/chat.js";
import { createEmbeddings } from "../integrations/gemini/embeddings.js";
import { createLogger } from "../logging/logger.js";
import { type Services, createServices } from "../services.js";

export function createRuntime(settings: Settings): { logger: Logger; services: Services } {
  // stdout is reserved for command output.
  const logger = createLogger({ level: settings.logLevel, destination: pino.destination(2) });
  const services = createServices({
    settings,
    logger,
    embeddings: createEmbeddings(settings),
    chatModel: createChatModel(settings)
  });
  return { logger, services };
}
