import type { Logger } from "pino";

import { IndexCorruptionError } from "../errors.js";
import { tokenize } from "./tokenize.js";
import type { LexicalHit, SearchScope, Turn, TurnRef } from "./types.js";
import { compareHits, inScope } from "./types.js";

export type LexicalEntry = Readonly<{
  turn: Readonly<TurnRef>;
  userId: string;
  tokens: readonly string[];
  termFrequencies: ReadonlyMap<string, number>;
}>;

type IdfTable = ReadonlyMap<string, number>;

type UserPartition = {
  entries: Map<string, LexicalEntry>;
  idf: IdfTable | null;
};

function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const t of tokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  const tf = new Map<string, number>();
  for (const [term, count] of counts) tf.set(term, count / tokens.length);
  return tf;
}

/** Smoothed IDF; always > 0 so term weights stay non-negative. */
export function computeIdf(entries: Iterable<LexicalEntry>): Map<string, number> {
  const df = new Map<string, number>();
  let n = 0;
  for (const entry of entries) {
    n += 1;
    for (const term of entry.termFrequencies.keys()) {
      df.set(term, (df.get(term) ?? 0) + 1);
    }
  }
  const idf = new Map<string, number>();
  for (const [term, count] of df) {
    idf.set(term, Math.log((1 + n) / (1 + count)) + 1);
  }
  return idf;
}

/**
 * TF-IDF index over conversation turns, partitioned by user. Each user's IDF
 * table is computed over that user's turns only and rebuilt lazily on the
 * first search after any write.
 */
export class LexicalIndex {
  private readonly partitions = new Map<string, UserPartition>();
  private readonly logger: Logger;

  constructor(params: { logger: Logger }) {
    this.logger = params.logger.child({ component: "lexical-index" });
  }

  index(turn: Turn): LexicalEntry {
    const tokens = tokenize(turn.text);
    const entry: LexicalEntry = Object.freeze({
      turn: Object.freeze({
        id: turn.id,
        projectId: turn.projectId,
        role: turn.role,
        text: turn.text,
        createdAt: turn.createdAt
      }),
      userId: turn.userId,
      tokens: Object.freeze(tokens),
      termFrequencies: termFrequencies(tokens)
    });

    const partition = this.partition(turn.userId);
    partition.entries.set(turn.id, entry);
    partition.idf = null;
    return entry;
  }

  search(query: string, scope: SearchScope): LexicalHit[] {
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0) return [];

    const partition = this.partitions.get(scope.userId);
    if (!partition || partition.entries.size === 0) return [];

    const idf = this.idfFor(scope.userId, partition);
    const hits: LexicalHit[] = [];
    for (const entry of partition.entries.values()) {
      if (!inScope(entry.turn, scope)) continue;
      let score = 0;
      const matchedTerms: string[] = [];
      for (const term of queryTerms) {
        const tf = entry.termFrequencies.get(term);
        if (tf == null) continue;
        const weight = idf.get(term);
        if (weight == null || weight < 0) {
          throw new IndexCorruptionError(`IDF table has no valid weight for indexed term "${term}"`);
        }
        score += tf * weight;
        matchedTerms.push(term);
      }
      if (matchedTerms.length > 0) {
        hits.push({ kind: "lexical", turn: entry.turn, score, matchedTerms });
      }
    }
    return hits.sort(compareHits);
  }

  evictProject(userId: string, projectId: string): number {
    const partition = this.partitions.get(userId);
    if (!partition) return 0;
    let removed = 0;
    for (const [turnId, entry] of partition.entries) {
      if (entry.turn.projectId === projectId) {
        partition.entries.delete(turnId);
        removed += 1;
      }
    }
    if (removed > 0) partition.idf = null;
    this.logger.debug({ userId, projectId, removed }, "Evicted project");
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

  entry(userId: string, turnId: string): LexicalEntry | undefined {
    return this.partitions.get(userId)?.entries.get(turnId);
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
      partition = { entries: new Map(), idf: null };
      this.partitions.set(userId, partition);
    }
    return partition;
  }

  private idfFor(userId: string, partition: UserPartition): IdfTable {
    if (partition.idf) return partition.idf;
    const snapshot = [...partition.entries.values()];
    const idf = computeIdf(snapshot);
    partition.idf = idf;
    this.logger.debug({ userId, documents: snapshot.length, terms: idf.size }, "Rebuilt IDF table");
    return idf;
  }
}
