import { describe, it, expect } from 'vitest';
import { encodeText } from './feature-encoder.js';

function norm(v: Float32Array): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

describe('encodeText', () => {
  it('returns a unit vector of the requested width', () => {
    const v = encodeText('2,4,6 -> 8', 64);
    expect(v).toHaveLength(64);
    expect(norm(v)).toBeCloseTo(1, 5);
  });

  it('is deterministic', () => {
    expect(encodeText('hello world', 32)).toEqual(encodeText('hello world', 32));
  });

  it('ignores case and whitespace runs', () => {
    expect(encodeText('Hello   World', 32)).toEqual(encodeText('hello world', 32));
  });

  it('maps empty text to the zero vector', () => {
    expect(norm(encodeText('   ', 16))).toBe(0);
  });

  it('separates different texts', () => {
    expect(encodeText('alpha', 128)).not.toEqual(encodeText('omega', 128));
  });
});
