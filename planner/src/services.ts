import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { Logger } from "pino";

import { PlanningChat } from "./chat/planningChat.js";
import type { Settings } from "./config/settings.js";
import { ConversationStore } from "./memory/conversationStore.js";
import { CrossProjectLinker } from "./rag/crossProject.js";
import { ReferenceDetector } from "./rag/referenceDetector.js";
import { HybridRanker } from "./retrieval/hybridRanker.js";
import { TurnIndexer } from "./retrieval/indexer.js";
import { LexicalIndex } from "./retrieval/lexicalIndex.js";
import { SemanticIndex } from "./retrieval/semanticIndex.js";

export type ServiceSettings = Pick<
  Settings,
  | "dataDir"
  | "embeddingDimension"
  | "embeddingTimeoutMs"
  | "lexicalWeight"
  | "semanticWeight"
  | "searchTopK"
  | "contextTopK"
  | "referenceCues"
  | "systemPrompt"
  | "historyMaxMessages"
>;

export type Services = {
  store: ConversationStore;
  lexical: LexicalIndex;
  semantic: SemanticIndex;
  indexer: TurnIndexer;
  ranker: HybridRanker;
  detector: ReferenceDetector;
  linker: CrossProjectLinker;
  chat: PlanningChat;
};

/** Wire the store, both indexes and the chat flow around one set of collaborators. */
export function createServices(params: {
  settings: ServiceSettings;
  logger: Logger;
  embeddings: EmbeddingsInterface;
  chatModel: BaseChatModel;
  now?: () => number;
}): Services {
  const { settings, logger } = params;

  const store = new ConversationStore({ dataDir: settings.dataDir, logger, now: params.now });
  const lexical = new LexicalIndex({ logger });
  const semantic = new SemanticIndex({
    embeddings: params.embeddings,
    dimension: settings.embeddingDimension,
    timeoutMs: settings.embeddingTimeoutMs,
    logger
  });
  const indexer = new TurnIndexer({ store, lexical, semantic, logger }).attach();
  const ranker = new HybridRanker({
    lexical,
    semantic,
    projects: store,
    logger,
    weights: { lexical: settings.lexicalWeight, semantic: settings.semanticWeight },
    topK: settings.searchTopK
  });
  const detector = new ReferenceDetector({ extraCues: settings.referenceCues });
  const linker = new CrossProjectLinker({ detector, ranker, store, logger, topK: settings.contextTopK });
  const chat = new PlanningChat({
    store,
    linker,
    model: params.chatModel,
    systemPrompt: settings.systemPrompt,
    historyMaxMessages: settings.historyMaxMessages,
    logger
  });

  return { store, lexical, semantic, indexer, ranker, detector, linker, chat };
}
