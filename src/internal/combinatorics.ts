/**
 * Combinatorics Helpers
 *
 * Exact integer arithmetic over subsets of at most 16 elements, where every
 * binomial coefficient fits comfortably in a double.
 */

export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0
  const kk = Math.min(k, n - k)
  let result = 1
  for (let i = 1; i <= kk; i++) {
    result = (result * (n - kk + i)) / i
  }
  return Math.round(result)
}

/** Next larger mask with the same popcount (Gosper's hack) */
export function nextSamePopcount(mask: number): number {
  const lowest = mask & -mask
  const ripple = mask + lowest
  return (((ripple ^ mask) >>> 2) / lowest) | ripple
}

/** Every k-subset of n elements, as ascending bitmasks */
export function enumerateSubsets(n: number, k: number): number[] {
  if (k === 0) return [0]
  const limit = 1 << n
  const out: number[] = []
  for (let mask = (1 << k) - 1; mask < limit; mask = nextSamePopcount(mask)) {
    out.push(mask)
  }
  return out
}

/**
 * Map a rank in [0, C(n, k)) to a k-subset bitmask via the combinatorial
 * number system: rank = C(c_k, k) + ... + C(c_1, 1) with c_k > ... > c_1.
 */
export function unrankSubset(rank: number, n: number, k: number): number {
  let remaining = rank
  let mask = 0
  let upper = n
  for (let i = k; i >= 1; i--) {
    let c = i - 1
    while (c + 1 < upper && binomial(c + 1, i) <= remaining) c++
    remaining -= binomial(c, i)
    mask |= 1 << c
    upper = c
  }
  return mask
}
