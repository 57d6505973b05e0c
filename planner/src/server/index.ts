import { serve } from "@hono/node-server";
import type { Logger } from "pino";

import type { Settings } from "../config/settings.js";
import { errorMessage } from "../errors.js";
import type { Services } from "../services.js";
import { createApp } from "./app.js";

/**
 * Rebuild the indexes from the store, start listening, and keep retrying
 * pending embeddings until the process is told to stop.
 */
export async function startServer(params: {
  settings: Settings;
  services: Services;
  logger: Logger;
}): Promise<void> {
  const { settings, services, logger } = params;

  const report = await services.indexer.rebuild();
  logger.info(report, "Indexes ready");

  const app = createApp({ services, logger });
  const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
    logger.info({ port: info.port }, "Listening");
  });

  const retry = setInterval(() => {
    services.indexer.retryPending().catch((err: unknown) => {
      logger.error({ err: errorMessage(err) }, "Pending embedding retry failed");
    });
  }, settings.retryIntervalMs);
  retry.unref();

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, "Shutting down");
      clearInterval(retry);
      server.close(() => resolve());
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });

  await services.indexer.flush();
}
