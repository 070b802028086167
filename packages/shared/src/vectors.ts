/**
 * Cosine similarity of two equal-length vectors. Returns 0 when either
 * vector has zero magnitude or the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Element-wise mean of a running centroid and one more member */
export function updateCentroid(
  centroid: readonly number[],
  memberCount: number,
  added: readonly number[],
): number[] {
  return centroid.map((v, i) => (v * memberCount + added[i]) / (memberCount + 1));
}

/** Text embedded for an article: title plus the head of the body */
export function embeddingText(title: string, body: string): string {
  const head = body.slice(0, 2000);
  return head ? `${title}\n\n${head}` : title;
}
