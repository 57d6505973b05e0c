import type { SearchMode } from "../retrieval/types.js";

export type Command = "serve" | "search" | "reindex";

const COMMANDS: readonly Command[] = ["serve", "search", "reindex"];

const SEARCH_MODES: Record<string, SearchMode> = {
  tfidf: "lexical",
  lexical: "lexical",
  vector: "semantic",
  semantic: "semantic",
  hybrid: "hybrid"
};

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  const found = COMMANDS.find((c) => c === command);
  if (!found) {
    throw new Error("Usage: socratic <serve|search|reindex> [...]");
  }
  return { command: found, args: rest };
}

export type SearchArgs = {
  userId: string;
  query: string;
  mode: SearchMode;
};

/** `<user> <query words...> [--mode tfidf|vector|hybrid]` */
export function parseSearchArgs(args: string[]): SearchArgs {
  const [userId, ...rest] = args;
  const modeFlag = rest.indexOf("--mode");
  const modeName = modeFlag >= 0 ? rest[modeFlag + 1] ?? "" : "hybrid";
  const words = modeFlag >= 0 ? [...rest.slice(0, modeFlag), ...rest.slice(modeFlag + 2)] : rest;
  const query = words.join(" ").trim();
  const mode = SEARCH_MODES[modeName];

  if (!userId || !query || !mode) {
    throw new Error("Usage: socratic search <user> <query> [--mode tfidf|vector|hybrid]");
  }
  return { userId, query, mode };
}
