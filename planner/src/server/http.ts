import type { Context, MiddlewareHandler } from "hono";
import type { ZodError } from "zod";

import { normalizeUserId } from "../memory/conversationStore.js";

export type AppEnv = {
  Variables: {
    userId: string;
  };
};

export const USER_HEADER = "x-user";

/** Nickname identity: every API route needs the X-User header. */
export const requireUser: MiddlewareHandler<AppEnv> = async (c, next) => {
  const userId = normalizeUserId(c.req.header(USER_HEADER) ?? "");
  if (!userId) {
    return c.json({ error: { code: "UNAUTHENTICATED", message: "X-User header is required" } }, 401);
  }
  c.set("userId", userId);
  await next();
};

/** Request body as JSON, or undefined when it is missing or malformed. */
export async function readBody(c: Context<AppEnv>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export function validationError(c: Context<AppEnv>, error: ZodError | string) {
  return c.json(
    {
      error: {
        code: "VALIDATION_ERROR",
        message: typeof error === "string" ? error : "Invalid request body",
        details: typeof error === "string" ? [] : error.issues
      }
    },
    400
  );
}
