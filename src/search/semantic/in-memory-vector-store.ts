/**
 * Brute-force cosine vector store held in memory
 */

import type { VectorQueryHit, VectorStore } from './types';

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error('Vector dimensions do not match');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aValue = a[i];
    const bValue = b[i];

    if (aValue !== undefined && bValue !== undefined) {
      dotProduct += aValue * bValue;
      normA += aValue * aValue;
      normB += bValue * bValue;
    }
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  private vectors: Map<string, Float32Array> = new Map();

  upsert(id: string, vector: Float32Array): void {
    const dimensions = this.getDimensions();
    if (dimensions !== null && vector.length !== dimensions) {
      throw new Error(`Expected ${dimensions} dimensions, got ${vector.length}`);
    }
    this.vectors.set(id, vector);
  }

  remove(id: string): boolean {
    return this.vectors.delete(id);
  }

  clear(): void {
    this.vectors.clear();
  }

  size(): number {
    return this.vectors.size;
  }

  async query(vector: Float32Array, topN: number): Promise<VectorQueryHit[]> {
    if (topN <= 0) {
      return [];
    }

    const hits: Array<VectorQueryHit & { order: number }> = [];
    let order = 0;
    for (const [id, stored] of this.vectors) {
      hits.push({ id, distance: 1 - cosineSimilarity(vector, stored), order: order++ });
    }

    hits.sort((a, b) => (a.distance - b.distance) || (a.order - b.order));

    return hits.slice(0, topN).map(({ id, distance }) => ({ id, distance }));
  }

  private getDimensions(): number | null {
    for (const stored of this.vectors.values()) {
      return stored.length;
    }
    return null;
  }
}
