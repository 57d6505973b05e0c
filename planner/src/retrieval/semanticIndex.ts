import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { Logger } from "pino";

import { IndexCorruptionError, ProviderUnavailableError } from "../errors.js";
import { dot, toUnitVector } from "./similarity.js";
import { withProviderTimeout } from "./timeout.js";
import type { SearchScope, SemanticHit, Turn, TurnRef } from "./types.js";
import { compareHits, inScope } from "./types.js";

export type SemanticEntry = Readonly<{
  turn: Readonly<TurnRef>;
  userId: string;
  vector: readonly number[];
}>;

type UserPartition = {
  entries: Map<string, SemanticEntry>;
  // Stored turns that have no vector yet, including in-flight ones.
  pending: Map<string, Turn>;
  // Turns whose vector was malformed; never retried.
  rejected: Map<string, Turn>;
  inFlight: Set<string>;
  // Per project: turns created at or before this time are refused.
  cutoffs: Map<string, number>;
};

export type RetryReport = {
  indexed: number;
  failed: number;
  rejected: number;
};

/**
 * Embedding index partitioned by user. Vectors are unit length with a
 * dimension fixed at construction, so cosine similarity is a dot product.
 */
export class SemanticIndex {
  readonly dimension: number;
  private readonly embeddings: EmbeddingsInterface;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly partitions = new Map<string, UserPartition>();

  constructor(params: {
    embeddings: EmbeddingsInterface;
    dimension: number;
    timeoutMs: number;
    logger: Logger;
  }) {
    if (!Number.isInteger(params.dimension) || params.dimension <= 0) {
      throw new Error(`Embedding dimension must be a positive integer, got ${params.dimension}`);
    }
    this.embeddings = params.embeddings;
    this.dimension = params.dimension;
    this.timeoutMs = params.timeoutMs;
    this.logger = params.logger.child({ component: "semantic-index" });
  }

  /**
   * Embed and publish one turn. Resolves to null when the turn's project was
   * deleted or cleared while the embedding was in flight. On provider failure
   * the turn stays pending and ProviderUnavailableError is thrown; a malformed
   * vector moves the turn to the rejected set and IndexCorruptionError is
   * thrown.
   */
  async index(turn: Turn): Promise<SemanticEntry | null> {
    const partition = this.partition(turn.userId);
    if (this.isCutOff(partition, turn)) return null;

    partition.pending.set(turn.id, turn);
    partition.rejected.delete(turn.id);
    partition.inFlight.add(turn.id);
    try {
      const raw = await withProviderTimeout("Embedding", this.timeoutMs, async () => {
        const vectors = await this.embeddings.embedDocuments([turn.text]);
        return vectors[0] ?? [];
      });

      if (this.partitions.get(turn.userId) !== partition || this.isCutOff(partition, turn)) {
        this.logger.debug({ turnId: turn.id, projectId: turn.projectId }, "Discarded embedding for removed turn");
        return null;
      }

      let vector: readonly number[];
      try {
        vector = Object.freeze(toUnitVector(raw, this.dimension));
      } catch (err: unknown) {
        if (err instanceof IndexCorruptionError) {
          partition.pending.delete(turn.id);
          partition.rejected.set(turn.id, turn);
          this.logger.error({ turnId: turn.id, err: err.message }, "Rejected malformed embedding");
        }
        throw err;
      }

      const entry: SemanticEntry = Object.freeze({
        turn: Object.freeze({
          id: turn.id,
          projectId: turn.projectId,
          role: turn.role,
          text: turn.text,
          createdAt: turn.createdAt
        }),
        userId: turn.userId,
        vector
      });
      partition.entries.set(turn.id, entry);
      partition.pending.delete(turn.id);
      return entry;
    } finally {
      partition.inFlight.delete(turn.id);
    }
  }

  /** Best effort: an unavailable provider yields no hits instead of an error. */
  async search(query: string, scope: SearchScope, topK: number): Promise<SemanticHit[]> {
    if (query.trim().length === 0 || topK <= 0) return [];
    if ((this.partitions.get(scope.userId)?.entries.size ?? 0) === 0) return [];

    let queryVector: number[];
    try {
      const raw = await withProviderTimeout("Query embedding", this.timeoutMs, () =>
        this.embeddings.embedQuery(query)
      );
      queryVector = toUnitVector(raw, this.dimension);
    } catch (err: unknown) {
      if (err instanceof ProviderUnavailableError || err instanceof IndexCorruptionError) {
        this.logger.warn({ userId: scope.userId, err: err.message }, "Semantic search degraded to no results");
        return [];
      }
      throw err;
    }

    // Read the partition again: it may have changed while the query was embedding.
    const partition = this.partitions.get(scope.userId);
    if (!partition) return [];

    const hits: SemanticHit[] = [];
    for (const entry of partition.entries.values()) {
      if (!inScope(entry.turn, scope)) continue;
      hits.push({ kind: "semantic", turn: entry.turn, score: dot(queryVector, entry.vector) });
    }
    return hits.sort(compareHits).slice(0, topK);
  }

  async retryPending(userId?: string): Promise<RetryReport> {
    const report: RetryReport = { indexed: 0, failed: 0, rejected: 0 };
    const userIds = userId != null ? [userId] : [...this.partitions.keys()];
    for (const uid of userIds) {
      const partition = this.partitions.get(uid);
      if (!partition) continue;
      const waiting = [...partition.pending.values()].filter((t) => !partition.inFlight.has(t.id));
      for (const turn of waiting) {
        try {
          const entry = await this.index(turn);
          if (entry) report.indexed += 1;
        } catch (err: unknown) {
          if (err instanceof ProviderUnavailableError) {
            report.failed += 1;
          } else if (err instanceof IndexCorruptionError) {
            report.rejected += 1;
          } else {
            throw err;
          }
        }
      }
    }
    if (report.indexed + report.failed + report.rejected > 0) {
      this.logger.info(report, "Retried pending embeddings");
    }
    return report;
  }

  /**
   * Remove a project's vectors created at or before `upTo` and refuse any such
   * embedding still in flight. The default removes the whole project for
   * good; project ids are never reused.
   */
  evictProject(userId: string, projectId: string, upTo: number = Number.POSITIVE_INFINITY): number {
    const partition = this.partition(userId);
    partition.cutoffs.set(projectId, Math.max(upTo, partition.cutoffs.get(projectId) ?? upTo));
    let removed = 0;
    for (const [turnId, entry] of partition.entries) {
      if (entry.turn.projectId === projectId && entry.turn.createdAt <= upTo) {
        partition.entries.delete(turnId);
        removed += 1;
      }
    }
    for (const waiting of [partition.pending, partition.rejected]) {
      for (const [turnId, turn] of waiting) {
        if (turn.projectId === projectId && turn.createdAt <= upTo) waiting.delete(turnId);
      }
    }
    this.logger.debug({ userId, projectId, upTo, removed }, "Evicted project");
    return removed;
  }

  evictUser(userId: string): void {
    this.partitions.delete(userId);
  }

  clear(): void {
    this.partitions.clear();
  }

  has(userId: string, turnId: string): boolean {
    return this.partitions.get(userId)?.entries.has(turnId) ?? false;
  }

  entry(userId: string, turnId: string): SemanticEntry | undefined {
    return this.partitions.get(userId)?.entries.get(turnId);
  }

  pendingCount(userId?: string): number {
    if (userId != null) return this.partitions.get(userId)?.pending.size ?? 0;
    let total = 0;
    for (const p of this.partitions.values()) total += p.pending.size;
    return total;
  }

  rejectedCount(userId?: string): number {
    if (userId != null) return this.partitions.get(userId)?.rejected.size ?? 0;
    let total = 0;
    for (const p of this.partitions.values()) total += p.rejected.size;
    return total;
  }

  size(userId?: string): number {
    if (userId != null) return this.partitions.get(userId)?.entries.size ?? 0;
    let total = 0;
    for (const p of this.partitions.values()) total += p.entries.size;
    return total;
  }

  private partition(userId: string): UserPartition {
    let partition = this.partitions.get(userId);
    if (!partition) {
      partition = {
        entries: new Map(),
        pending: new Map(),
        rejected: new Map(),
        inFlight: new Set(),
        cutoffs: new Map()
      };
      this.partitions.set(userId, partition);
    }
    return partition;
  }

  private isCutOff(partition: UserPartition, turn: Turn): boolean {
    const cutoff = partition.cutoffs.get(turn.projectId);
    return cutoff != null && turn.createdAt <= cutoff;
  }
}
