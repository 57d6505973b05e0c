import type { Logger } from "pino";

import { InvalidScopeError } from "../errors.js";
import { normalizeUserId } from "../memory/conversationStore.js";
import type { LexicalIndex } from "./lexicalIndex.js";
import type { SemanticIndex } from "./semanticIndex.js";
import type {
  Hit,
  LexicalHit,
  Project,
  RankedResult,
  SearchMode,
  SearchResponse,
  SearchScope,
  SemanticHit,
  TurnRef
} from "./types.js";
import { compareHits } from "./types.js";

export type FusionWeights = {
  lexical: number;
  semantic: number;
};

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = { lexical: 0.5, semantic: 0.5 };

const SNIPPET_LENGTH = 160;
// Semantic candidates pulled per requested result in hybrid mode.
const SEMANTIC_POOL_FACTOR = 5;

export interface ProjectDirectory {
  getProject(userId: string, projectId: string): Promise<Project | undefined>;
}

export type FusedHit = {
  turn: TurnRef;
  score: number;
  lexicalScore?: number;
  semanticScore?: number;
};

export function validateWeights(weights: FusionWeights): FusionWeights {
  const { lexical, semantic } = weights;
  if (!Number.isFinite(lexical) || !Number.isFinite(semantic) || lexical < 0 || semantic < 0) {
    throw new Error("Fusion weights must be finite and non-negative");
  }
  if (lexical === 0 && semantic === 0) {
    throw new Error("At least one fusion weight must be positive");
  }
  return { lexical, semantic };
}

function maxScore(hits: readonly Hit[]): number {
  let max = 0;
  for (const h of hits) if (h.score > max) max = h.score;
  return max;
}

function normalized(score: number, max: number): number {
  return max > 0 ? Math.max(0, score) / max : 0;
}

/**
 * Merge the two scoring spaces. Each side is scaled into [0, 1] by its own
 * maximum; a turn missing from one side gets 0 there. Turns that end up with
 * no weight at all are dropped.
 */
export function fuseHits(
  lexical: readonly LexicalHit[],
  semantic: readonly SemanticHit[],
  weights: FusionWeights = DEFAULT_FUSION_WEIGHTS
): FusedHit[] {
  const lexMax = maxScore(lexical);
  const semMax = maxScore(semantic);
  const fused = new Map<string, FusedHit>();

  for (const hit of lexical) {
    fused.set(hit.turn.id, {
      turn: hit.turn,
      score: weights.lexical * normalized(hit.score, lexMax),
      lexicalScore: hit.score
    });
  }
  for (const hit of semantic) {
    const contribution = weights.semantic * normalized(hit.score, semMax);
    const existing = fused.get(hit.turn.id);
    if (existing) {
      existing.score += contribution;
      existing.semanticScore = hit.score;
    } else {
      fused.set(hit.turn.id, { turn: hit.turn, score: contribution, semanticScore: hit.score });
    }
  }

  return [...fused.values()].filter((h) => h.score > 0).sort(compareHits);
}

export function makeSnippet(text: string, maxLength: number = SNIPPET_LENGTH): string {
  const flat = text.replace(/\s+/g, " ").trim();
  const chars = [...flat];
  if (chars.length <= maxLength) return flat;
  return `${chars.slice(0, maxLength - 1).join("")}…`;
}

function toResult(hit: FusedHit): RankedResult {
  const result: RankedResult = {
    turnId: hit.turn.id,
    projectId: hit.turn.projectId,
    role: hit.turn.role,
    score: hit.score,
    snippet: makeSnippet(hit.turn.text),
    createdAt: hit.turn.createdAt
  };
  if (hit.lexicalScore != null) result.lexicalScore = hit.lexicalScore;
  if (hit.semanticScore != null) result.semanticScore = hit.semanticScore;
  return result;
}

function fromLexical(hit: LexicalHit): FusedHit {
  return { turn: hit.turn, score: hit.score, lexicalScore: hit.score };
}

function fromSemantic(hit: SemanticHit): FusedHit {
  return { turn: hit.turn, score: hit.score, semanticScore: hit.score };
}

export class HybridRanker {
  readonly weights: FusionWeights;
  private readonly lexical: LexicalIndex;
  private readonly semantic: SemanticIndex;
  private readonly projects: ProjectDirectory;
  private readonly defaultTopK: number;
  private readonly logger: Logger;

  constructor(params: {
    lexical: LexicalIndex;
    semantic: SemanticIndex;
    projects: ProjectDirectory;
    logger: Logger;
    weights?: FusionWeights;
    topK?: number;
  }) {
    this.lexical = params.lexical;
    this.semantic = params.semantic;
    this.projects = params.projects;
    this.weights = validateWeights(params.weights ?? DEFAULT_FUSION_WEIGHTS);
    this.defaultTopK = params.topK ?? 10;
    this.logger = params.logger.child({ component: "hybrid-ranker" });
  }

  /** The returned mode always echoes the requested one, results or not. */
  async search<M extends SearchMode>(
    query: string,
    requested: SearchScope,
    mode: M,
    topK: number = this.defaultTopK
  ): Promise<SearchResponse<M>> {
    const scope: SearchScope = { ...requested, userId: normalizeUserId(requested.userId) };
    await this.assertScope(scope);
    const limit = Math.max(0, Math.floor(topK));
    if (query.trim().length === 0 || limit === 0) {
      return { mode, results: [] };
    }

    let ranked: FusedHit[];
    if (mode === "lexical") {
      ranked = this.lexical.search(query, scope).map(fromLexical);
    } else if (mode === "semantic") {
      ranked = (await this.semantic.search(query, scope, limit)).map(fromSemantic);
    } else {
      const semanticHits = await this.semantic.search(query, scope, limit * SEMANTIC_POOL_FACTOR);
      // Lexical runs after the await so it reflects every write that landed meanwhile.
      const lexicalHits = this.lexical.search(query, scope);
      ranked = fuseHits(lexicalHits, semanticHits, this.weights);
      this.logger.debug(
        { userId: scope.userId, lexical: lexicalHits.length, semantic: semanticHits.length },
        "Fused hybrid results"
      );
    }

    return { mode, results: ranked.slice(0, limit).map(toResult) };
  }

  private async assertScope(scope: SearchScope): Promise<void> {
    if (scope.userId.length === 0) {
      throw new InvalidScopeError("Search scope requires a user");
    }
    for (const projectId of [scope.projectId, scope.excludeProjectId]) {
      if (projectId == null) continue;
      const project = await this.projects.getProject(scope.userId, projectId);
      if (!project) {
        throw new InvalidScopeError(`Project ${projectId} does not belong to user ${scope.userId}`);
      }
    }
  }
}
