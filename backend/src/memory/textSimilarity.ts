import { tokenize } from '../services/emotionClassifier';

const STOPWORDS = new Set(['a', 'an', 'the', 'is', 'are', 'to', 'of', 'and', 'or', 'it', 'i', 'you', 'me', 'my', 'please']);

export type TermVector = Map<string, number>;

export function termVector(text: string): TermVector {
  const vector: TermVector = new Map();
  for (const token of tokenize(text)) {
    if (STOPWORDS.has(token)) continue;
    vector.set(token, (vector.get(token) ?? 0) + 1);
  }
  return vector;
}

/** Cosine similarity of two bag-of-words vectors, 0 when either is empty. */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  if (a.size === 0 || b.size === 0) return 0;

  let dot = 0;
  for (const [term, weight] of a) {
    dot += weight * (b.get(term) ?? 0);
  }
  const norm = (v: TermVector) => Math.sqrt([...v.values()].reduce((sum, w) => sum + w * w, 0));
  return dot / (norm(a) * norm(b));
}
