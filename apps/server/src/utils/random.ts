// Uniform source in [0, 1), same contract as Math.random
export type RandomSource = () => number

// Small seedable PRNG so a room (or a test) can replay its shuffles
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0
  return () => {
    a = (a + 0x6d2b79f5) >>> 0
    let t = a
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// Integer in [0, maxExclusive)
export function randomInt(rng: RandomSource, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive)
}

// Derive a 32-bit seed from a uuid so every room gets an independent stream
export function seedFromId(id: string): number {
  let h = 0x811c9dc5
  for (let i = 0; i < id.length; i++) {
    h ^= id.charCodeAt(i)
    h = Math.imul(h, 0x01000193) >>> 0
  }
  return h >>> 0
}
