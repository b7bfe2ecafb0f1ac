import { ADAPTER_HEADER_BYTES, serializedAdapterBytes, type LowRankWeights } from '@domain/types/adapter.js';
import { AdapterRank } from '@domain/types/training.js';

const MAGIC = 0x50524d41; // "PRMA"

function checksum(bytes: Uint8Array): number {
  let hash = 0x811c9dc5;
  for (const byte of bytes) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Serialize weights as a 16-byte header (magic, dim, rank, FNV-1a checksum of
 * the payload) followed by A then B as little-endian float32.
 */
export function encodeAdapterWeights(weights: LowRankWeights): Buffer {
  const buffer = Buffer.alloc(serializedAdapterBytes(weights));
  let offset = ADAPTER_HEADER_BYTES;
  for (const value of weights.a) offset = buffer.writeFloatLE(value, offset);
  for (const value of weights.b) offset = buffer.writeFloatLE(value, offset);

  buffer.writeUInt32BE(MAGIC, 0);
  buffer.writeUInt32LE(weights.dim, 4);
  buffer.writeUInt32LE(weights.rank, 8);
  buffer.writeUInt32LE(checksum(buffer.subarray(ADAPTER_HEADER_BYTES)), 12);
  return buffer;
}

export function decodeAdapterWeights(buffer: Buffer): LowRankWeights {
  if (buffer.length < ADAPTER_HEADER_BYTES || buffer.readUInt32BE(0) !== MAGIC) {
    throw new Error('Not a serialized adapter');
  }
  const dim = buffer.readUInt32LE(4);
  const rank = AdapterRank.safeParse(buffer.readUInt32LE(8));
  if (!rank.success) {
    throw new Error(`Unsupported adapter rank ${buffer.readUInt32LE(8)}`);
  }

  const size = dim * rank.data;
  if (buffer.length !== ADAPTER_HEADER_BYTES + 2 * size * Float32Array.BYTES_PER_ELEMENT) {
    throw new Error(`Adapter payload has ${buffer.length} bytes; expected dim ${dim} × rank ${rank.data}`);
  }
  if (checksum(buffer.subarray(ADAPTER_HEADER_BYTES)) !== buffer.readUInt32LE(12)) {
    throw new Error('Adapter checksum mismatch');
  }

  const a = new Float32Array(size);
  const b = new Float32Array(size);
  let offset = ADAPTER_HEADER_BYTES;
  for (let i = 0; i < size; i++, offset += 4) a[i] = buffer.readFloatLE(offset);
  for (let i = 0; i < size; i++, offset += 4) b[i] = buffer.readFloatLE(offset);
  return { dim, rank: rank.data, a, b };
}
