import type { Settings } from "../../config/settings.js";
import { createRuntime } from "../runtime.js";

export async function runReindexCommand(settings: Settings): Promise<void> {
  const { services } = createRuntime(settings);
  const report = await services.indexer.rebuild();
  process.stdout.write(`${JSON.stringify(report)}\n`);
  if (report.pending > 0 || report.rejected > 0) {
    process.exitCode = 2;
  }
}
