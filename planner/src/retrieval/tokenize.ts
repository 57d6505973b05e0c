import { readFileSync } from "node:fs";

import { z } from "zod";

const StopwordFileSchema = z.object({
  version: z.literal(1),
  particles: z.array(z.string().min(1)),
  stopwords: z.array(z.string().min(1))
});

function loadStopwordFile(): z.infer<typeof StopwordFileSchema> {
  const raw = readFileSync(new URL("../../data/stopwords.json", import.meta.url), "utf-8");
  return StopwordFileSchema.parse(JSON.parse(raw));
}

const stopwordFile = loadStopwordFile();
const STOPWORDS = new Set(stopwordFile.stopwords.map((w) => w.toLowerCase()));
// Longest first so "에서" wins over "에".
const PARTICLES = [...stopwordFile.particles].sort((a, b) => b.length - a.length);
const PARTICLE_SET = new Set(PARTICLES);

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;
const HANGUL_PATTERN = /\p{Script=Hangul}/u;

function stripParticle(token: string): string {
  for (const particle of PARTICLES) {
    if (token.endsWith(particle) && token.length - particle.length >= 2) {
      return token.slice(0, token.length - particle.length);
    }
  }
  return token;
}

export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase();
}

/**
 * Split text into index terms. Hangul words lose one trailing particle
 * ("창업을" → "창업"); stopwords and single Latin characters are dropped.
 */
export function tokenize(text: string): string[] {
  const words = normalizeText(text).match(WORD_PATTERN) ?? [];
  const tokens: string[] = [];
  for (const word of words) {
    const hangul = HANGUL_PATTERN.test(word);
    const term = hangul ? stripParticle(word) : word;
    if (STOPWORDS.has(term) || STOPWORDS.has(word)) continue;
    if (!hangul && term.length < 2) continue;
    if (hangul && term.length === 1 && PARTICLE_SET.has(term)) continue;
    tokens.push(term);
  }
  return tokens;
}
