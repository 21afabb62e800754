/**
 * Seeded randomness for segment selection.
 *
 * Generators are plain values passed explicitly; each job owns its own stream.
 */

export interface RandomSource {
  readonly seed: number
  /** Uniform float in [0, 1). */
  next(): number
}

/** mulberry32: small, fast, 32-bit state. */
export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    seed: seed >>> 0,
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/** Uniform integer in [0, maxExclusive). */
export function randomInt(random: RandomSource, maxExclusive: number): number {
  return Math.floor(random.next() * maxExclusive)
}

/**
 * Per-job seed from the run seed and the job index (murmur3 finalizer over
 * the pair). Same inputs always give the same seed.
 */
export function deriveJobSeed(runSeed: number, jobIndex: number): number {
  let h = (runSeed >>> 0) ^ Math.imul(jobIndex + 1, 0x9e3779b1)
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b)
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35)
  return (h ^ (h >>> 16)) >>> 0
}

/** Seed for a run when the caller supplied none. Logged so the run can be replayed. */
export function generateRunSeed(now: number = Date.now()): number {
  return deriveJobSeed(now % 0x7fffffff, Math.floor(Math.random() * 0xffff))
}

/**
 * Draw `count` items in random order.
 *
 * Without replacement (partial Fisher–Yates) while the pool is large enough;
 * with replacement once `count` exceeds the pool, so duplicates can appear.
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  if (items.length === 0 || count <= 0) return []
  if (count > items.length) {
    return Array.from({ length: count }, () => items[randomInt(random, items.length)])
  }
  const pool = [...items]
  for (let i = 0; i < count; i++) {
    const j = i + randomInt(random, pool.length - i)
    const tmp = pool[i]
    pool[i] = pool[j]
    pool[j] = tmp
  }
  return pool.slice(0, count)
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined
  return items[randomInt(random, items.length)]
}
