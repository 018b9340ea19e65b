/**
 * Vector helpers shared by the pgvector adapter and the in-memory index.
 *
 * Both stores must rank by the same metric, so distance functions live here
 * next to the pgvector literal encoder.
 */
export type DistanceMetric = "cosine" | "l2";

export function toPgVectorLiteral(vector: readonly number[]): string {
  if (!Array.isArray(vector)) {
    throw new TypeError("toPgVectorLiteral expected an array");
  }

  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

/**
 * Cosine distance, `1 - cos θ`. A zero vector is treated as orthogonal to
 * everything (distance 1). Callers guarantee equal lengths.
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }

  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function l2Distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export function distanceFunction(
  metric: DistanceMetric
): (a: readonly number[], b: readonly number[]) => number {
  return metric === "l2" ? l2Distance : cosineDistance;
}

/** pgvector operator for the metric: `<=>` cosine distance, `<->` Euclidean. */
export function pgDistanceOperator(metric: DistanceMetric): "<=>" | "<->" {
  return metric === "l2" ? "<->" : "<=>";
}
