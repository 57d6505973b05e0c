export type Role = "user" | "assistant";

export type Turn = {
  id: string;
  userId: string;
  projectId: string;
  role: Role;
  text: string;
  createdAt: number;
};

export type Project = {
  id: string;
  userId: string;
  name: string;
  createdAt: number;
  updatedAt: number;
  turnCount: number;
};

/**
 * Which turns a search may see. `projectId` narrows to one project,
 * `excludeProjectId` hides one (used for cross-project lookups).
 */
export type SearchScope = {
  userId: string;
  projectId?: string;
  excludeProjectId?: string;
};

export type SearchMode = "lexical" | "semantic" | "hybrid";

/** The slice of a turn the indexes keep so hits can be ranked and shown. */
export type TurnRef = Pick<Turn, "id" | "projectId" | "role" | "text" | "createdAt">;

export type LexicalHit = {
  kind: "lexical";
  turn: TurnRef;
  score: number;
  matchedTerms: string[];
};

export type SemanticHit = {
  kind: "semantic";
  turn: TurnRef;
  score: number;
};

export type Hit = LexicalHit | SemanticHit;

export type RankedResult = {
  turnId: string;
  projectId: string;
  role: Role;
  score: number;
  snippet: string;
  createdAt: number;
  lexicalScore?: number;
  semanticScore?: number;
};

export type SearchResponse<M extends string = SearchMode> = {
  mode: M;
  results: RankedResult[];
};

export function inScope(turn: Pick<Turn, "projectId">, scope: SearchScope): boolean {
  if (scope.projectId != null && turn.projectId !== scope.projectId) return false;
  if (scope.excludeProjectId != null && turn.projectId === scope.excludeProjectId) return false;
  return true;
}

/** Higher score first, then newer turn, then turn id so equal inputs always sort the same. */
export function compareHits(
  a: { score: number; turn: Pick<TurnRef, "id" | "createdAt"> },
  b: { score: number; turn: Pick<TurnRef, "id" | "createdAt"> }
): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.turn.createdAt !== a.turn.createdAt) return b.turn.createdAt - a.turn.createdAt;
  return a.turn.id < b.turn.id ? -1 : a.turn.id > b.turn.id ? 1 : 0;
}
