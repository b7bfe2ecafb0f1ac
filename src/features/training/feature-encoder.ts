const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Frozen text encoder: signed feature hashing of character trigrams into
 * `dim` buckets, L2-normalised. Empty text maps to the zero vector.
 *
 * Deterministic and stateless, so it is safe to share across requests.
 */
export function encodeText(text: string, dim: number): Float32Array {
  const vector = new Float32Array(dim);
  const padded = ` ${text.toLowerCase().replace(/\s+/g, ' ').trim()} `;
  if (padded.trim().length === 0) return vector;

  for (let i = 0; i + 3 <= padded.length; i++) {
    const hash = fnv1a(padded.slice(i, i + 3));
    const bucket = hash % dim;
    // High bit picks the sign so collisions cancel rather than pile up
    vector[bucket] += hash & 0x80000000 ? -1 : 1;
  }

  let norm = 0;
  for (const v of vector) norm += v * v;
  norm = Math.sqrt(norm);
  if (norm === 0) return vector;

  for (let i = 0; i < dim; i++) vector[i] /= norm;
  return vector;
}
