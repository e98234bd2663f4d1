// src/embeddings/deterministic.ts
import crypto from 'node:crypto';

/** Convert a seed string to a 32-bit unsigned int. */
export function seedToUint32(seed: string): number {
  const h = crypto.createHash('sha256').update(seed, 'utf8').digest();
  return (((h[0] << 24) >>> 0) ^ (h[1] << 16) ^ (h[2] << 8) ^ h[3]) >>> 0;
}

/** Mulberry32 PRNG, deterministic for a given seed. */
export function mulberry32(seedUint32: number): () => number {
  let t = seedUint32 >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Standard normal sample from two uniform draws (Box–Muller). */
export function gaussian(rnd: () => number): number {
  // 1 - u keeps the log argument in (0, 1]
  const u = 1 - rnd();
  const v = rnd();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
