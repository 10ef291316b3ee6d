// src/util/sql.ts
// What: Helpers for vectors and scoring.
// How: vectorToParam formats an array for ::vector casting after checking every value is finite;
//      clampSimilarity converts cosine distance to [0,1].

export function vectorToParam(v: number[]): string {
  if (v.length === 0) {
    throw new Error('Embedding array cannot be empty');
  }
  v.forEach((value, i) => {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid embedding value at index ${i}: must be a finite number`);
    }
  });
  // Postgres vector literal: [0.1,0.2,...]
  return `[${v.join(',')}]`;
}

export function clampSimilarity(distance: number): number {
  const sim = 1 - distance;
  if (sim < 0) return 0;
  if (sim > 1) return 1;
  return sim;
}

export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  // A zero vector has no direction; treat it as orthogonal to everything.
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
