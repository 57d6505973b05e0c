import pLimit from "p-limit";
import type { Logger } from "pino";

import { IndexCorruptionError, ProviderUnavailableError, errorMessage } from "../errors.js";
import type { ConversationListener, ConversationStore } from "../memory/conversationStore.js";
import type { LexicalIndex } from "./lexicalIndex.js";
import type { RetryReport, SemanticIndex } from "./semanticIndex.js";
import type { Turn } from "./types.js";

const REBUILD_CONCURRENCY = 4;

export type RebuildReport = {
  users: number;
  projects: number;
  turns: number;
  pending: number;
  rejected: number;
};

/**
 * Write path from the conversation store into both indexes. Lexical indexing
 * is synchronous; embeddings run in the background and land in the semantic
 * index's pending set when the provider fails, or its rejected set when the
 * vector is malformed.
 */
export class TurnIndexer implements ConversationListener {
  private readonly store: ConversationStore;
  private readonly lexical: LexicalIndex;
  private readonly semantic: SemanticIndex;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(params: {
    store: ConversationStore;
    lexical: LexicalIndex;
    semantic: SemanticIndex;
    logger: Logger;
  }) {
    this.store = params.store;
    this.lexical = params.lexical;
    this.semantic = params.semantic;
    this.logger = params.logger.child({ component: "indexer" });
  }

  /** Subscribe to the store so every appended turn gets indexed. */
  attach(): this {
    this.store.addListener(this);
    return this;
  }

  turnAppended(turn: Turn): void {
    this.lexical.index(turn);
    this.track(this.embed(turn));
  }

  projectDeleted(userId: string, projectId: string): void {
    const lexical = this.lexical.evictProject(userId, projectId);
    const semantic = this.semantic.evictProject(userId, projectId);
    this.logger.info({ userId, projectId, lexical, semantic }, "Evicted deleted project from indexes");
  }

  turnsCleared(userId: string, projectId: string, upTo: number): void {
    const lexical = this.lexical.evictProject(userId, projectId);
    const semantic = this.semantic.evictProject(userId, projectId, upTo);
    this.logger.info({ userId, projectId, lexical, semantic }, "Evicted cleared conversation from indexes");
  }

  /** Resolves once every background embedding started so far has settled. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  retryPending(userId?: string): Promise<RetryReport> {
    return this.semantic.retryPending(userId);
  }

  /** Drop both indexes and re-read every stored turn. */
  async rebuild(): Promise<RebuildReport> {
    await this.flush();
    this.lexical.clear();
    this.semantic.clear();

    const report: RebuildReport = { users: 0, projects: 0, turns: 0, pending: 0, rejected: 0 };
    const limit = pLimit(REBUILD_CONCURRENCY);
    const embeddings: Promise<void>[] = [];

    for (const userId of await this.store.listUsers()) {
      report.users += 1;
      for (const project of await this.store.listProjects(userId)) {
        report.projects += 1;
        for (const turn of await this.store.listTurns(userId, project.id)) {
          report.turns += 1;
          this.lexical.index(turn);
          embeddings.push(limit(() => this.embed(turn)));
        }
      }
    }

    await Promise.all(embeddings);
    report.pending = this.semantic.pendingCount();
    report.rejected = this.semantic.rejectedCount();
    this.logger.info(report, "Rebuilt indexes");
    return report;
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  // Never rejects: failures are logged and the semantic index keeps the turn
  // pending or rejected.
  private async embed(turn: Turn): Promise<void> {
    try {
      await this.semantic.index(turn);
    } catch (err: unknown) {
      if (err instanceof ProviderUnavailableError) {
        this.logger.warn({ turnId: turn.id, err: err.message }, "Embedding deferred; turn left pending");
        return;
      }
      if (err instanceof IndexCorruptionError) return;
      this.logger.error({ turnId: turn.id, err: errorMessage(err) }, "Embedding failed; turn left pending");
    }
  }
}
