import { Hono } from "hono";
import type { Logger } from "pino";

import { PlannerError, type PlannerErrorCode } from "../errors.js";
import type { Services } from "../services.js";
import { type AppEnv, requireUser } from "./http.js";
import { createChatRoutes } from "./routes/chat.js";
import { createProjectRoutes } from "./routes/projects.js";
import { createSearchRoutes } from "./routes/search.js";

const ERROR_STATUS = {
  INVALID_INPUT: 400,
  INVALID_SCOPE: 404,
  CONFLICT: 409,
  STORAGE_ERROR: 500,
  INDEX_CORRUPTION: 500,
  PROVIDER_UNAVAILABLE: 503
} as const satisfies Record<PlannerErrorCode, number>;

export interface AppOptions {
  services: Services;
  logger: Logger;
}

export function createApp(options: AppOptions) {
  const { services } = options;
  const logger = options.logger.child({ component: "http" });
  const app = new Hono<AppEnv>();

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      indexed: services.lexical.size(),
      embedded: services.semantic.size(),
      pendingEmbeddings: services.semantic.pendingCount(),
      rejectedEmbeddings: services.semantic.rejectedCount()
    })
  );

  app.use("*", requireUser);
  app.route("/", createSearchRoutes({ ranker: services.ranker, logger }));
  app.route("/", createProjectRoutes({ store: services.store }));
  app.route("/", createChatRoutes({ chat: services.chat, linker: services.linker, store: services.store }));

  app.onError((err, c) => {
    if (err instanceof PlannerError) {
      const status = ERROR_STATUS[err.code];
      if (status >= 500) {
        logger.error({ err, path: c.req.path }, "Request failed");
      }
      return c.json({ error: { code: err.code, message: err.message } }, status);
    }
    logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } }, 500);
  });

  return app;
}
