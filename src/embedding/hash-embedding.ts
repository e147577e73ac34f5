/**
 * Deterministic local embeddings
 *
 * Feature hashing over content tokens: each token lands in one bucket with a
 * hash-derived sign, the vector is L2-normalized. Texts sharing words score
 * a positive cosine similarity, unrelated texts score near zero. Used when
 * the remote provider is absent or failing.
 */

import { createHash } from 'crypto'
import { normalize } from './vector'
import { tokenize } from '../utils/text'

export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0)

  for (const token of tokenize(text)) {
    const digest = createHash('sha256').update(token).digest()
    const bucket = digest.readUInt32BE(0) % dimensions
    const sign = (digest[4] & 1) === 0 ? 1 : -1
    vector[bucket] += sign
  }

  return normalize(vector)
}
