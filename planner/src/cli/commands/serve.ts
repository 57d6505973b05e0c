import type { Settings } from "../../config/settings.js";
import { startServer } from "../../server/index.js";
import { createRuntime } from "../runtime.js";

export async function runServeCommand(settings: Settings): Promise<void> {
  const { logger, services } = createRuntime(settings);
  await startServer({ settings, services, logger });
}
