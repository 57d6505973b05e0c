import { Hono } from "hono";
import { z } from "zod";

import type { ConversationStore } from "../../memory/conversationStore.js";
import type { AppEnv } from "../http.js";
import { readBody, validationError } from "../http.js";

const ProjectNameSchema = z.object({
  name: z.string().trim().min(1).max(60)
});

export interface ProjectRoutesOptions {
  store: ConversationStore;
}

export function createProjectRoutes(options: ProjectRoutesOptions) {
  const { store } = options;
  const app = new Hono<AppEnv>();

  app.get("/projects", async (c) => {
    const projects = await store.listProjects(c.get("userId"));
    return c.json({ projects });
  });

  app.post("/projects", async (c) => {
    const parsed = ProjectNameSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const project = await store.createProject(c.get("userId"), parsed.data.name);
    return c.json({ project }, 201);
  });

  app.patch("/projects/:id", async (c) => {
    const parsed = ProjectNameSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const project = await store.renameProject(c.get("userId"), c.req.param("id"), parsed.data.name);
    return c.json({ project });
  });

  // Resolves only after both indexes have dropped the project's turns.
  app.delete("/projects/:id", async (c) => {
    await store.deleteProject(c.get("userId"), c.req.param("id"));
    return c.json({ status: "ok" });
  });

  app.get("/projects/:id/turns", async (c) => {
    const turns = await store.listTurns(c.get("userId"), c.req.param("id"));
    return c.json({ turns });
  });

  return app;
}
