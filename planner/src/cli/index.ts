#!/usr/bin/env node
import { loadEnv } from "../config/env.js";
import { loadSettings } from "../config/settings.js";
import { runReindexCommand } from "./commands/reindex.js";
import { runSearchCommand } from "./commands/search.js";
import { runServeCommand } from "./commands/serve.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  loadEnv();
  const settings = loadSettings();
  const parsed = parseCli(argv);

  if (parsed.command === "serve") {
    await runServeCommand(settings);
    return;
  }

  if (parsed.command === "search") {
    await runSearchCommand(parsed.args, settings);
    return;
  }

  if (parsed.command === "reindex") {
    await runReindexCommand(settings);
    return;
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
