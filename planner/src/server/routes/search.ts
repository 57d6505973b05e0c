import { Hono } from "hono";
import type { Logger } from "pino";
import { z } from "zod";

import type { HybridRanker } from "../../retrieval/hybridRanker.js";
import type { SearchMode } from "../../retrieval/types.js";
import type { AppEnv } from "../http.js";
import { readBody, validationError } from "../http.js";

// Wire names kept for existing API consumers.
const MODES = {
  tfidf: "lexical",
  vector: "semantic",
  hybrid: "hybrid"
} as const satisfies Record<string, SearchMode>;

const SearchSchema = z.object({
  query: z.string().max(2000),
  mode: z.enum(["tfidf", "vector", "hybrid"]).default("hybrid"),
  projectId: z.string().min(1).optional(),
  topK: z.number().int().min(1).max(50).optional()
});

export interface SearchRoutesOptions {
  ranker: HybridRanker;
  logger: Logger;
}

export function createSearchRoutes(options: SearchRoutesOptions) {
  const { ranker, logger } = options;
  const app = new Hono<AppEnv>();

  // POST /search - lexical, semantic or fused search over the user's turns
  app.post("/search", async (c) => {
    const parsed = SearchSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const { query, mode, projectId, topK } = parsed.data;
    if (query.trim().length === 0) {
      return validationError(c, "Query is required");
    }

    const userId = c.get("userId");
    const response = await ranker.search(query, { userId, projectId }, MODES[mode], topK);
    logger.debug({ userId, mode, results: response.results.length }, "Search served");
    return c.json({ mode, results: response.results });
  });

  return app;
}
