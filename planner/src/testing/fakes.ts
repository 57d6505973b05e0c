import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { Embeddings } from "@langchain/core/embeddings";
import { FakeListChatModel } from "@langchain/core/utils/testing";

import { silentLogger } from "../logging/logger.js";
import { type ServiceSettings, type Services, createServices } from "../services.js";

/**
 * Deterministic in-process embeddings. Each configured concept owns one
 * axis; a text lights up every axis whose keywords it contains. Texts with no
 * keyword land on a shared fallback axis. Texts listed in `zeroFor` get an
 * all-zero vector.
 */
export class ConceptEmbeddings extends Embeddings {
  readonly dimension: number;
  calls = 0;
  failing = false;
  delayMs = 0;
  readonly zeroFor = new Set<string>();
  private readonly concepts: string[][];

  constructor(concepts: string[][]) {
    super({});
    this.concepts = concepts;
    this.dimension = concepts.length + 1;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embedQuery(t)));
  }

  async embedQuery(text: string): Promise<number[]> {
    this.calls += 1;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failing) {
      throw new Error("embedding provider offline");
    }
    if (this.zeroFor.has(text)) {
      return new Array<number>(this.dimension).fill(0);
    }
    const lower = text.toLowerCase();
    const vector = this.concepts.map((words) => (words.some((w) => lower.includes(w)) ? 1 : 0));
    const any = vector.some((v) => v > 0);
    return [...vector, any ? 0 : 1];
  }
}

export const TEST_SETTINGS: Omit<ServiceSettings, "dataDir" | "embeddingDimension"> = {
  embeddingTimeoutMs: 200,
  lexicalWeight: 0.5,
  semanticWeight: 0.5,
  searchTopK: 10,
  contextTopK: 3,
  referenceCues: [],
  systemPrompt: "test system prompt",
  historyMaxMessages: 20
};

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "socratic-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function buildTestServices(params: {
  dataDir: string;
  embeddings: ConceptEmbeddings;
  responses?: string[];
  settings?: Partial<ServiceSettings>;
}): Services {
  return createServices({
    settings: {
      ...TEST_SETTINGS,
      dataDir: params.dataDir,
      embeddingDimension: params.embeddings.dimension,
      ...params.settings
    },
    logger: silentLogger(),
    embeddings: params.embeddings,
    chatModel: new FakeListChatModel({ responses: params.responses ?? ["테스트 응답"] })
  });
}
