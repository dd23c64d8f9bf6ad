import { validationError } from '../api/errors.js';

/**
 * Cosine similarity of two vectors of the same length.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw validationError(`Vectors differ in length (${a.length} vs ${b.length})`, { field: 'embeddings' });
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
    throw validationError('Cannot compare a zero vector', { field: 'embeddings' });
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
