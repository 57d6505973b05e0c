import { IndexCorruptionError } from "../errors.js";

export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new IndexCorruptionError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Check a raw provider vector against the fixed index dimension and scale it
 * to unit length. Wrong length, non-finite values and zero vectors are
 * corruption, never padded or truncated.
 */
export function toUnitVector(vector: readonly number[], expectedDim: number): number[] {
  if (vector.length !== expectedDim) {
    throw new IndexCorruptionError(
      `Embedding dimension mismatch: expected=${expectedDim} actual=${vector.length}`
    );
  }
  let norm2 = 0;
  for (const v of vector) {
    if (!Number.isFinite(v)) {
      throw new IndexCorruptionError("Embedding contains a non-finite value");
    }
    norm2 += v * v;
  }
  const norm = Math.sqrt(norm2);
  if (norm === 0) {
    throw new IndexCorruptionError("Embedding has zero norm");
  }
  return vector.map((v) => v / norm);
}
