import type { Logger } from "pino";

import type { ConversationStore } from "../memory/conversationStore.js";
import { normalizeUserId } from "../memory/conversationStore.js";
import type { HybridRanker } from "../retrieval/hybridRanker.js";
import type { RankedResult } from "../retrieval/types.js";
import type { ReferenceDetector } from "./referenceDetector.js";

export type ContextItem = RankedResult & {
  projectName: string;
};

export type ContextBundle = {
  /** Cue that triggered the lookup, or null when fetched directly. */
  cue: string | null;
  query: string;
  items: ContextItem[];
};

/**
 * Pulls context from a user's other projects when a message refers back to
 * earlier work. Only supplies data; generation happens elsewhere.
 */
export class CrossProjectLinker {
  private readonly detector: ReferenceDetector;
  private readonly ranker: HybridRanker;
  private readonly store: ConversationStore;
  private readonly topK: number;
  private readonly logger: Logger;

  constructor(params: {
    detector: ReferenceDetector;
    ranker: HybridRanker;
    store: ConversationStore;
    logger: Logger;
    topK?: number;
  }) {
    this.detector = params.detector;
    this.ranker = params.ranker;
    this.store = params.store;
    this.topK = params.topK ?? 3;
    this.logger = params.logger.child({ component: "cross-project" });
  }

  detect(message: string): boolean {
    return this.detector.detect(message);
  }

  /**
   * Hybrid search over every project of the user except the current one.
   * Null means there is nothing to reference: no other project has turns.
   */
  async fetchContext(userId: string, currentProjectId: string, message: string): Promise<ContextBundle | null> {
    const user = normalizeUserId(userId);
    if (!(await this.store.hasTurnsOutside(user, currentProjectId))) {
      return null;
    }

    const query = this.detector.queryFor(message);
    const response = await this.ranker.search(
      query,
      { userId: user, excludeProjectId: currentProjectId },
      "hybrid",
      this.topK
    );

    // A project deleted during the search has no name left; drop its hits.
    const names = new Map((await this.store.listProjects(user)).map((p) => [p.id, p.name]));
    const items: ContextItem[] = response.results.flatMap((result) => {
      const projectName = names.get(result.projectId);
      return projectName == null ? [] : [{ ...result, projectName }];
    });

    const cue = this.detector.match(message)?.cue ?? null;
    this.logger.debug({ userId: user, currentProjectId, cue, items: items.length }, "Fetched cross-project context");
    return { cue, query, items };
  }

  /** Null when the message carries no backward-reference cue. */
  async resolve(userId: string, projectId: string, message: string): Promise<ContextBundle | null> {
    if (!this.detector.detect(message)) return null;
    return this.fetchContext(userId, projectId, message);
  }
}
