import type { Settings } from "../../config/settings.js";
import { parseSearchArgs } from "../parse.js";
import { createRuntime } from "../runtime.js";

export async function runSearchCommand(args: string[], settings: Settings): Promise<void> {
  const { userId, query, mode } = parseSearchArgs(args);

  const { services } = createRuntime(settings);
  await services.indexer.rebuild();
  const response = await services.ranker.search(query, { userId }, mode);
  process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
}
