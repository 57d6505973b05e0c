import path from "node:path";

const DEFAULT_SYSTEM_PROMPT = `# 소크라테스식 기획 도우미

당신은 소크라테스식 질문과 비판을 통해 기획을 돕는 조력자입니다.

## 핵심 규칙

### 질문은 반드시 한 번에 하나씩
- 절대 여러 질문을 한 번에 하지 않는다.
- 하나의 질문 → 답변 대기 → 다음 질문.

### 3단계 프로세스 (사용자가 버튼으로 단계 전환)
STEP 1: 나열 - 필요한 것들을 하나씩 꺼내기
STEP 2: 분류 - 항목들을 그룹으로 묶기
STEP 3: 재배열 - 실행 순서/구조 만들기

### 진행 방식
1. 먼저 "어떤 문제/주제를 다루고 싶어?"로 시작한다.
2. STEP 1에서는 계속 나열하게 유도한다.
3. 사용자가 답하면 추가 제안과 비판적 질문을 한다.
4. 단계 전환은 사용자가 버튼으로 한다. 자동으로 넘어가지 않는다.

### 대립자 역할
- 항상 반대 관점에서 질문한다. "정말?", "왜?", "없으면 어떻게 돼?"
- 쉽게 넘어가지 않는다.

### 단계 전환 명령
- "[STEP2로 이동]": STEP 1에서 나열된 항목을 번호 목록으로 정리하고, 분류 기준을 물어본다.
- "[STEP3로 이동]": STEP 2의 분류 결과를 그룹별로 정리하고, 실행 순서를 물어본다.
- "[정리]": 나열된 항목, 분류, 실행 순서, 핵심 인사이트를 최종 정리한다.

### 이전 프로젝트 참고
- "이전 프로젝트 대화" 블록이 주어지면, 사용자가 언급한 과거 내용으로 참고만 한다.
- 블록에 없는 과거 내용은 지어내지 않는다.

### 금지사항
- 여러 질문 한번에 하기
- 사용자 대신 다 정리해주기
- 자동으로 단계 전환하기
- "좋아요!"만 하고 넘어가기

항상 한국어로 대화합니다.`;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type Settings = {
  googleApiKey: string;
  chatModel: string;
  embeddingModel: string;
  embeddingDimension: number;
  embeddingTimeoutMs: number;
  retryIntervalMs: number;
  dataDir: string;
  systemPrompt: string;
  historyMaxMessages: number;
  lexicalWeight: number;
  semanticWeight: number;
  searchTopK: number;
  contextTopK: number;
  referenceCues: string[];
  port: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function readInt(raw: string | undefined, fallback: number, min: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? Math.max(min, value) : fallback;
}

function readWeight(name: string, raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number`);
  }
  return value;
}

function readLogLevel(raw: string | undefined): LogLevel {
  const level = (raw ?? "info").toLowerCase();
  const found = LOG_LEVELS.find((l) => l === level);
  if (!found) {
    throw new Error(`SOCRATIC_LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return found;
}

export function loadSettings(env: Env = process.env): Settings {
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (!googleApiKey) {
    throw new Error("GOOGLE_API_KEY is required");
  }

  const dataDir = env.SOCRATIC_DATA_DIR ?? path.join(".socratic", "conversations");

  const lexicalWeight = readWeight("SOCRATIC_LEXICAL_WEIGHT", env.SOCRATIC_LEXICAL_WEIGHT, 0.5);
  const semanticWeight = readWeight("SOCRATIC_SEMANTIC_WEIGHT", env.SOCRATIC_SEMANTIC_WEIGHT, 0.5);
  if (lexicalWeight === 0 && semanticWeight === 0) {
    throw new Error("SOCRATIC_LEXICAL_WEIGHT and SOCRATIC_SEMANTIC_WEIGHT cannot both be 0");
  }

  const referenceCues = (env.SOCRATIC_REFERENCE_CUES ?? "")
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0);

  return {
    googleApiKey,
    chatModel: env.SOCRATIC_GEMINI_MODEL ?? "gemini-2.5-flash",
    embeddingModel: env.SOCRATIC_GEMINI_EMBEDDING_MODEL ?? "gemini-embedding-001",
    embeddingDimension: readInt(env.SOCRATIC_EMBEDDING_DIMENSION, 3072, 1),
    embeddingTimeoutMs: readInt(env.SOCRATIC_EMBEDDING_TIMEOUT_MS, 5000, 1),
    retryIntervalMs: readInt(env.SOCRATIC_RETRY_INTERVAL_MS, 30000, 1000),
    dataDir,
    systemPrompt: env.SOCRATIC_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    historyMaxMessages: readInt(env.SOCRATIC_HISTORY_MAX_MESSAGES, 40, 0),
    lexicalWeight,
    semanticWeight,
    searchTopK: readInt(env.SOCRATIC_SEARCH_TOP_K, 10, 1),
    contextTopK: readInt(env.SOCRATIC_CONTEXT_TOP_K, 3, 1),
    referenceCues,
    port: readInt(env.PORT, 5050, 1),
    logLevel: readLogLevel(env.SOCRATIC_LOG_LEVEL)
  };
}
