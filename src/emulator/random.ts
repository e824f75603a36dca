import type { Byte, RandomSource } from './types';

export const mathRandomSource: RandomSource = {
  nextByte: () => Math.floor(Math.random() * 256) & 0xff,
};

// mulberry32: small deterministic generator for reproducible runs
export function seededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return {
    nextByte(): Byte {
      s = (s + 0x6d2b79f5) >>> 0;
      let t = s;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) & 0xff;
    },
  };
}

// Replays a fixed byte sequence, cycling when exhausted
export function sequenceRandom(bytes: readonly Byte[]): RandomSource {
  if (bytes.length === 0) throw new Error('sequenceRandom needs at least one byte');
  let i = 0;
  return {
    nextByte(): Byte {
      const v = bytes[i % bytes.length];
      i++;
      return v & 0xff;
    },
  };
}
