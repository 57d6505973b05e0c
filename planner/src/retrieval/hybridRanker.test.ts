import { beforeEach, describe, expect, it } from "vitest";

import { InvalidScopeError } from "../errors.js";
import { silentLogger } from "../logging/logger.js";
import { ConceptEmbeddings } from "../testing/fakes.js";
import { HybridRanker, type ProjectDirectory, fuseHits, makeSnippet, validateWeights } from "./hybridRanker.js";
import { LexicalIndex } from "./lexicalIndex.js";
import { SemanticIndex } from "./semanticIndex.js";
import type { LexicalHit, Project, SemanticHit, Turn, TurnRef } from "./types.js";

function ref(id: string, createdAt = 1): TurnRef {
  return { id, projectId: "p1", role: "user", text: id, createdAt };
}

function lex(id: string, score: number, createdAt = 1): LexicalHit {
  return { kind: "lexical", turn: ref(id, createdAt), score, matchedTerms: [] };
}

function sem(id: string, score: number, createdAt = 1): SemanticHit {
  return { kind: "semantic", turn: ref(id, createdAt), score };
}

describe("fuseHits", () => {
  it("scales each side by its maximum before weighting", () => {
    const fused = fuseHits([lex("A", 2), lex("B", 1)], [sem("B", 0.8), sem("C", 0.4)]);

    expect(fused.map((h) => h.turn.id)).toEqual(["B", "A", "C"]);
    expect(fused[0]?.score).toBeCloseTo(0.75, 10);
    expect(fused[1]?.score).toBeCloseTo(0.5, 10);
    expect(fused[2]?.score).toBeCloseTo(0.25, 10);
    expect(fused[0]).toMatchObject({ lexicalScore: 1, semanticScore: 0.8 });
    expect(fused[1]?.semanticScore).toBeUndefined();
  });

  it("never ranks a turn below one it beats on both sides", () => {
    const fused = fuseHits([lex("X", 3), lex("Y", 2)], [sem("X", 0.9), sem("Y", 0.1)]);
    expect(fused.map((h) => h.turn.id)).toEqual(["X", "Y"]);
  });

  it("scores every turn at least as high with both weights as with either alone", () => {
    const lexical = [lex("A", 2), lex("B", 1), lex("D", 0.5)];
    const semantic = [sem("B", 0.8), sem("C", 0.4), sem("D", 0.9)];
    const scores = (weights: { lexical: number; semantic: number }) =>
      new Map(fuseHits(lexical, semantic, weights).map((h) => [h.turn.id, h.score]));

    const both = scores({ lexical: 0.5, semantic: 0.5 });
    const lexicalOnly = scores({ lexical: 0.5, semantic: 0 });
    const semanticOnly = scores({ lexical: 0, semantic: 0.5 });

    for (const id of ["A", "B", "C", "D"]) {
      expect(both.get(id) ?? 0).toBeGreaterThanOrEqual(lexicalOnly.get(id) ?? 0);
      expect(both.get(id) ?? 0).toBeGreaterThanOrEqual(semanticOnly.get(id) ?? 0);
    }
    expect(lexicalOnly.has("C")).toBe(false);
    expect(semanticOnly.has("A")).toBe(false);
  });

  it("falls back to the other side when one is empty", () => {
    const fused = fuseHits([], [sem("A", 0.4), sem("B", 0.2)]);
    expect(fused.map((h) => h.score)).toEqual([0.5, 0.25]);
  });

  it("drops turns whose only evidence is non-positive", () => {
    const fused = fuseHits([], [sem("A", 0.6), sem("B", 0), sem("C", -0.3)]);
    expect(fused.map((h) => h.turn.id)).toEqual(["A"]);
  });

  it("orders equal fused scores by newest turn", () => {
    const fused = fuseHits([lex("old", 1, 1), lex("new", 1, 2)], []);
    expect(fused.map((h) => h.turn.id)).toEqual(["new", "old"]);
  });

  it("applies custom weights", () => {
    const fused = fuseHits([lex("A", 1)], [sem("B", 1)], { lexical: 0.8, semantic: 0.2 });
    expect(fused.map((h) => [h.turn.id, h.score])).toEqual([
      ["A", 0.8],
      ["B", 0.2]
    ]);
  });
});

describe("validateWeights", () => {
  it("rejects negative or all-zero weights", () => {
    expect(() => validateWeights({ lexical: -1, semantic: 1 })).toThrow("non-negative");
    expect(() => validateWeights({ lexical: 0, semantic: 0 })).toThrow("positive");
    expect(validateWeights({ lexical: 0, semantic: 1 })).toEqual({ lexical: 0, semantic: 1 });
  });
});

describe("makeSnippet", () => {
  it("collapses whitespace and truncates long text", () => {
    expect(makeSnippet("  카페\n\n창업   준비 ")).toBe("카페 창업 준비");
    expect(makeSnippet("abcdefghij", 5)).toBe("abcd…");
    expect(makeSnippet("abcde", 5)).toBe("abcde");
  });
});

class StaticDirectory implements ProjectDirectory {
  constructor(private readonly projects: Project[]) {}

  async getProject(userId: string, projectId: string): Promise<Project | undefined> {
    return this.projects.find((p) => p.userId === userId && p.id === projectId);
  }
}

function project(id: string, userId = "u1"): Project {
  return { id, userId, name: id, createdAt: 1, updatedAt: 1, turnCount: 0 };
}

describe("HybridRanker", () => {
  let embeddings: ConceptEmbeddings;
  let lexical: LexicalIndex;
  let semantic: SemanticIndex;
  let ranker: HybridRanker;

  async function add(turn: Turn): Promise<void> {
    lexical.index(turn);
    await semantic.index(turn);
  }

  beforeEach(() => {
    embeddings = new ConceptEmbeddings([
      ["카페", "coffee", "커피"],
      ["창업", "startup"]
    ]);
    lexical = new LexicalIndex({ logger: silentLogger() });
    semantic = new SemanticIndex({
      embeddings,
      dimension: embeddings.dimension,
      timeoutMs: 50,
      logger: silentLogger()
    });
    ranker = new HybridRanker({
      lexical,
      semantic,
      projects: new StaticDirectory([project("p1"), project("p2"), project("q1", "u2")]),
      logger: silentLogger()
    });
  });

  it("echoes the requested mode even without results", async () => {
    for (const mode of ["lexical", "semantic", "hybrid"] as const) {
      await expect(ranker.search("아무거나", { userId: "u1" }, mode)).resolves.toEqual({ mode, results: [] });
    }
  });

  it("returns an empty result for a blank query", async () => {
    await add({ id: "t1", userId: "u1", projectId: "p1", role: "user", text: "카페", createdAt: 1 });
    await expect(ranker.search("   ", { userId: "u1" }, "hybrid")).resolves.toEqual({ mode: "hybrid", results: [] });
  });

  it("rejects scopes naming another user's project", async () => {
    await expect(ranker.search("카페", { userId: "u1", projectId: "q1" }, "hybrid")).rejects.toBeInstanceOf(
      InvalidScopeError
    );
    await expect(ranker.search("카페", { userId: "" }, "lexical")).rejects.toBeInstanceOf(InvalidScopeError);
  });

  it("finds paraphrases semantically that share no terms", async () => {
    await add({ id: "t1", userId: "u1", projectId: "p1", role: "user", text: "커피 가게를 열고 싶어", createdAt: 1 });

    const lexicalOnly = await ranker.search("coffee", { userId: "u1" }, "lexical");
    const semanticOnly = await ranker.search("coffee", { userId: "u1" }, "semantic");
    expect(lexicalOnly.results).toEqual([]);
    expect(semanticOnly.results.map((r) => r.turnId)).toEqual(["t1"]);
    expect(semanticOnly.results[0]?.semanticScore).toBeCloseTo(1, 10);
  });

  it("combines both signals in hybrid mode", async () => {
    await add({ id: "both", userId: "u1", projectId: "p1", role: "user", text: "카페 창업 계획", createdAt: 1 });
    await add({ id: "menu", userId: "u1", projectId: "p2", role: "assistant", text: "카페 메뉴", createdAt: 2 });

    const response = await ranker.search("창업", { userId: "u1" }, "hybrid");
    expect(response.mode).toBe("hybrid");
    expect(response.results.map((r) => r.turnId)).toEqual(["both"]);
    expect(response.results[0]).toMatchObject({ projectId: "p1", role: "user", snippet: "카페 창업 계획", score: 1 });
  });

  it("keeps lexical results when the embedding provider is down", async () => {
    await add({ id: "t1", userId: "u1", projectId: "p1", role: "user", text: "카페 창업", createdAt: 1 });
    embeddings.failing = true;

    const response = await ranker.search("카페", { userId: "u1" }, "hybrid");
    expect(response.results.map((r) => r.turnId)).toEqual(["t1"]);
    expect(response.results[0]?.score).toBeCloseTo(0.5, 10);
  });

  it("keeps lexical results when the query embedding is malformed", async () => {
    await add({ id: "t1", userId: "u1", projectId: "p1", role: "user", text: "카페 창업", createdAt: 1 });
    embeddings.zeroFor.add("카페");

    const response = await ranker.search("카페", { userId: "u1" }, "hybrid");
    expect(response.results.map((r) => r.turnId)).toEqual(["t1"]);
    expect(response.results[0]?.score).toBeCloseTo(0.5, 10);
    await expect(ranker.search("카페", { userId: "u1" }, "semantic")).resolves.toEqual({
      mode: "semantic",
      results: []
    });
  });

  it("stops returning a project's turns once it is evicted", async () => {
    await add({ id: "t1", userId: "u1", projectId: "p1", role: "user", text: "카페 창업", createdAt: 1 });
    lexical.evictProject("u1", "p1");
    semantic.evictProject("u1", "p1");

    await expect(ranker.search("카페", { userId: "u1" }, "hybrid")).resolves.toEqual({ mode: "hybrid", results: [] });
  });

  it("limits results to topK", async () => {
    for (let i = 0; i < 4; i += 1) {
      await add({ id: `t${i}`, userId: "u1", projectId: "p1", role: "user", text: `카페 ${i}번`, createdAt: i });
    }
    const response = await ranker.search("카페", { userId: "u1" }, "lexical", 2);
    expect(response.results).toHaveLength(2);
  });
});
