import { promises as fs } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { StorageError } from "../errors.js";

import type { Services } from "../services.js";
import { ConceptEmbeddings, buildTestServices, makeTempDir, removeDir } from "../testing/fakes.js";

describe("TurnIndexer", () => {
  let dataDir: string;
  let embeddings: ConceptEmbeddings;
  let services: Services;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    embeddings = new ConceptEmbeddings([["카페"], ["창업"]]);
    services = buildTestServices({ dataDir, embeddings });
  });

  afterEach(async () => {
    await services.indexer.flush();
    await removeDir(dataDir);
  });

  it("indexes appended turns lexically at once and semantically after flush", async () => {
    const project = await services.store.createProject("u1", "카페");
    embeddings.delayMs = 20;
    const turn = await services.store.appendTurn("u1", project.id, "user", "카페 창업");

    expect(services.lexical.has("u1", turn.id)).toBe(true);
    await services.indexer.flush();
    expect(services.semantic.has("u1", turn.id)).toBe(true);
    expect(services.semantic.pendingCount()).toBe(0);
  });

  it("leaves turns pending while the provider is down", async () => {
    const project = await services.store.createProject("u1", "카페");
    embeddings.failing = true;
    const turn = await services.store.appendTurn("u1", project.id, "user", "카페 창업");
    await services.indexer.flush();

    expect(services.lexical.has("u1", turn.id)).toBe(true);
    expect(services.semantic.has("u1", turn.id)).toBe(false);
    expect(services.semantic.pendingCount("u1")).toBe(1);

    embeddings.failing = false;
    expect(await services.indexer.retryPending()).toEqual({ indexed: 1, failed: 0, rejected: 0 });
    expect(services.semantic.has("u1", turn.id)).toBe(true);
  });

  it("drops a project from both indexes when it is deleted mid-embedding", async () => {
    const project = await services.store.createProject("u1", "카페");
    embeddings.delayMs = 30;
    const turn = await services.store.appendTurn("u1", project.id, "user", "카페 창업");
    await services.store.deleteProject("u1", project.id);

    expect(services.lexical.has("u1", turn.id)).toBe(false);
    await services.indexer.flush();
    expect(services.semantic.has("u1", turn.id)).toBe(false);
    expect(services.semantic.pendingCount()).toBe(0);
  });

  it("forgets cleared turns, including one still embedding, and indexes later ones", async () => {
    const project = await services.store.createProject("u1", "카페");
    const kept = await services.store.createProject("u1", "서점");
    const other = await services.store.appendTurn("u1", kept.id, "user", "카페 옆 서점");
    embeddings.delayMs = 30;
    const cleared = await services.store.appendTurn("u1", project.id, "user", "카페 창업");

    await services.store.clearTurns("u1", project.id);
    expect(services.lexical.has("u1", cleared.id)).toBe(false);
    embeddings.delayMs = 0;
    const later = await services.store.appendTurn("u1", project.id, "user", "다시 카페 창업");
    await services.indexer.flush();

    expect(services.semantic.has("u1", cleared.id)).toBe(false);
    expect(services.semantic.has("u1", later.id)).toBe(true);
    expect(services.lexical.has("u1", later.id)).toBe(true);
    expect(services.semantic.has("u1", other.id)).toBe(true);
    expect(services.semantic.pendingCount()).toBe(0);
  });

  it("counts malformed embeddings as rejected during a rebuild", async () => {
    const cafe = await services.store.createProject("u1", "카페");
    await services.store.appendTurn("u1", cafe.id, "user", "카페 창업");
    await services.store.appendTurn("u1", cafe.id, "user", "빈 벡터");
    await services.indexer.flush();

    embeddings.zeroFor.add("빈 벡터");
    const report = await services.indexer.rebuild();
    expect(report).toEqual({ users: 1, projects: 1, turns: 2, pending: 0, rejected: 1 });
    expect(services.semantic.size("u1")).toBe(1);
  });

  it("evicts a deleted project whose conversation file is stuck on disk", async () => {
    const project = await services.store.createProject("u1", "카페");
    const turn = await services.store.appendTurn("u1", project.id, "user", "카페 창업");
    await services.indexer.flush();
    const file = path.join(dataDir, "u1", `${project.id}.json`);
    await fs.rm(file);
    await fs.mkdir(path.join(file, "child"), { recursive: true });

    await expect(services.store.deleteProject("u1", project.id)).rejects.toBeInstanceOf(StorageError);

    expect(await services.store.listProjects("u1")).toEqual([]);
    expect((await services.ranker.search("창업", { userId: "u1" }, "lexical")).results).toEqual([]);
    expect(services.semantic.has("u1", turn.id)).toBe(false);
  });

  it("rebuilds both indexes from the store", async () => {
    const cafe = await services.store.createProject("u1", "카페");
    const shop = await services.store.createProject("u1", "서점");
    await services.store.appendTurn("u1", cafe.id, "user", "카페 창업");
    await services.store.appendTurn("u1", cafe.id, "assistant", "어떤 카페인가요?");
    await services.store.appendTurn("u1", shop.id, "user", "서점 운영");
    await services.indexer.flush();

    const fresh = buildTestServices({ dataDir, embeddings });
    const report = await fresh.indexer.rebuild();

    expect(report).toEqual({ users: 1, projects: 2, turns: 3, pending: 0, rejected: 0 });
    expect(fresh.lexical.size("u1")).toBe(3);
    expect(fresh.semantic.size("u1")).toBe(3);
  });

  it("counts turns it could not embed during a rebuild", async () => {
    const cafe = await services.store.createProject("u1", "카페");
    await services.store.appendTurn("u1", cafe.id, "user", "카페 창업");
    await services.indexer.flush();

    embeddings.failing = true;
    const report = await services.indexer.rebuild();
    expect(report).toEqual({ users: 1, projects: 1, turns: 1, pending: 1, rejected: 0 });
    expect(services.lexical.size("u1")).toBe(1);
  });

  it("serves searches while writes are in flight", async () => {
    const project = await services.store.createProject("u1", "카페");
    embeddings.delayMs = 5;

    const writes = Array.from({ length: 8 }, (_, i) =>
      services.store.appendTurn("u1", project.id, "user", `카페 창업 ${i}`)
    );
    const searches = Array.from({ length: 8 }, () => services.ranker.search("카페", { userId: "u1" }, "hybrid"));
    const responses = await Promise.all(searches);
    await Promise.all(writes);
    await services.indexer.flush();

    for (const response of responses) {
      expect(response.mode).toBe("hybrid");
      for (const result of response.results) {
        expect(result.projectId).toBe(project.id);
      }
    }
    const settled = await services.ranker.search("카페", { userId: "u1" }, "hybrid", 20);
    expect(settled.results).toHaveLength(8);
  });
});
