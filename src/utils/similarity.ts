export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(Math.max(value, 0), 100);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Cosine similarity (-1..1) to a 0-100 score; negative similarity scores 0. */
export function similarityToScore(similarity: number): number {
  return roundScore(clampScore(similarity * 100));
}

/** pgvector's `<=>` operator returns cosine distance, i.e. 1 - similarity. */
export function cosineDistanceToScore(distance: number): number {
  return similarityToScore(1 - distance);
}
