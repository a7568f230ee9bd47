/**
 * Seeded PRNG
 *
 * Thin wrapper over seedrandom. Instances are created per generation call and
 * passed down explicitly; nothing here touches Math.random.
 */

import seedrandom from 'seedrandom'

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number
  /** Uniform integer in [0, maxExclusive) */
  int(maxExclusive: number): number
  pick<T>(items: readonly T[]): T
}

export function createRng(seed: string | number): Rng {
  const prng = seedrandom(String(seed))

  const next = (): number => prng.double()

  return {
    next,
    int(maxExclusive: number) {
      return Math.floor(next() * maxExclusive)
    },
    pick<T>(items: readonly T[]): T {
      const item = items[Math.floor(next() * items.length)]
      if (item === undefined) {
        throw new Error('Cannot pick from empty list')
      }
      return item
    },
  }
}
