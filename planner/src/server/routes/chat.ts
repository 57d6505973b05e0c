import { Hono } from "hono";
import { z } from "zod";

import type { PlanningChat } from "../../chat/planningChat.js";
import type { ConversationStore } from "../../memory/conversationStore.js";
import type { CrossProjectLinker } from "../../rag/crossProject.js";
import type { AppEnv } from "../http.js";
import { readBody, validationError } from "../http.js";

const ChatSchema = z.object({
  projectId: z.string().min(1),
  message: z.string().trim().min(1).max(10000)
});

const NextStepSchema = z.object({
  projectId: z.string().min(1),
  step: z.union([z.literal(2), z.literal(3)])
});

const ProjectRefSchema = z.object({
  projectId: z.string().min(1)
});

const MemoryQuerySchema = z.object({
  projectId: z.string().min(1),
  q: z.string().trim().min(1).optional()
});

export interface ChatRoutesOptions {
  chat: PlanningChat;
  linker: CrossProjectLinker;
  store: ConversationStore;
}

export function createChatRoutes(options: ChatRoutesOptions) {
  const { chat, linker, store } = options;
  const app = new Hono<AppEnv>();

  app.post("/chat", async (c) => {
    const parsed = ChatSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const reply = await chat.reply({ userId: c.get("userId"), ...parsed.data });
    return c.json(reply);
  });

  app.post("/next_step", async (c) => {
    const parsed = NextStepSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const reply = await chat.nextStep({ userId: c.get("userId"), ...parsed.data });
    return c.json({ ...reply, step: parsed.data.step });
  });

  app.post("/summarize", async (c) => {
    const parsed = ProjectRefSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const reply = await chat.summarize({ userId: c.get("userId"), ...parsed.data });
    return c.json(reply);
  });

  // POST /reset - start the project's conversation over
  app.post("/reset", async (c) => {
    const parsed = ProjectRefSchema.safeParse(await readBody(c));
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const project = await store.clearTurns(c.get("userId"), parsed.data.projectId);
    return c.json({ status: "ok", project });
  });

  // GET /memory - what other projects would contribute for `q`, or for the
  // project's latest user message when `q` is absent
  app.get("/memory", async (c) => {
    const parsed = MemoryQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return validationError(c, parsed.error);
    }
    const userId = c.get("userId");
    const { projectId, q } = parsed.data;
    const turns = await store.listTurns(userId, projectId);
    const message = q ?? turns.filter((t) => t.role === "user").at(-1)?.text;
    const context = message ? await linker.fetchContext(userId, projectId, message) : null;
    return c.json({ projectId, turnCount: turns.length, context });
  });

  return app;
}
