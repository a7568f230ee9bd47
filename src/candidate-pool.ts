/**
 * Candidate Pool
 *
 * Builds the set of distinct feasible task vectors the scheduler draws from.
 * For each active count k the full k-subset space is enumerated when it fits
 * the per-k cap; otherwise a uniform sample without replacement is taken
 * (Floyd's algorithm over combination ranks). The pool is a pure function of
 * (numElements, minActive, maxActive, poolCap).
 */

import type { ElementSet } from './element-set'
import { InfeasibleDesignError } from './errors'
import { type Result, Ok, Err } from './result'
import { createRng, type Rng } from './rng'
import { binomial, enumerateSubsets, unrankSubset } from './internal/combinatorics'

// ============================================================================
// Types
// ============================================================================

export type CandidateTask = {
  readonly mask: number
  readonly activeCount: number
}

export type CandidatePool = {
  readonly candidates: readonly CandidateTask[]
  readonly minActive: number
  readonly maxActive: number
  readonly poolCap: number
  /** Active counts whose subset space was sampled rather than enumerated */
  readonly sampledActiveCounts: readonly number[]
}

export type PoolKey = string

// ============================================================================
// Sampling
// ============================================================================

export function perActiveCountCap(poolCap: number, minActive: number, maxActive: number): number {
  const buckets = maxActive - minActive + 1
  return Math.max(1, Math.floor(poolCap / buckets))
}

function sampleRanks(total: number, count: number, rng: Rng): number[] {
  const chosen = new Set<number>()
  for (let j = total - count; j < total; j++) {
    const t = rng.int(j + 1)
    chosen.add(chosen.has(t) ? j : t)
  }
  return [...chosen].sort((a, b) => a - b)
}

function subsetsForActiveCount(n: number, k: number, cap: number): { masks: number[]; sampled: boolean } {
  const total = binomial(n, k)
  if (total <= cap) {
    return { masks: enumerateSubsets(n, k), sampled: false }
  }
  const rng = createRng(`pool:${n}:${k}:${cap}`)
  const masks = sampleRanks(total, cap, rng)
    .map(rank => unrankSubset(rank, n, k))
    .sort((a, b) => a - b)
  return { masks, sampled: true }
}

// ============================================================================
// Pool Construction
// ============================================================================

export function poolKey(numElements: number, minActive: number, maxActive: number, poolCap: number): PoolKey {
  return `${numElements}|${minActive}|${maxActive}|${poolCap}`
}

export function buildCandidatePool(
  elements: ElementSet,
  minActive: number,
  maxActive: number,
  poolCap: number
): Result<CandidatePool, InfeasibleDesignError> {
  if (minActive > maxActive) {
    return Err(new InfeasibleDesignError(
      `minActive (${minActive}) exceeds maxActive (${maxActive}); no task can satisfy both`
    ))
  }

  const n = elements.size
  const cap = perActiveCountCap(poolCap, minActive, maxActive)
  const seen = new Set<number>()
  const candidates: CandidateTask[] = []
  const sampledActiveCounts: number[] = []

  for (let k = Math.max(minActive, 1); k <= Math.min(maxActive, n); k++) {
    const { masks, sampled } = subsetsForActiveCount(n, k, cap)
    if (sampled) sampledActiveCounts.push(k)
    for (const mask of masks) {
      if (seen.has(mask)) continue
      seen.add(mask)
      candidates.push(Object.freeze({ mask, activeCount: k }))
    }
  }

  if (candidates.length === 0) {
    return Err(new InfeasibleDesignError(
      `No candidate tasks exist for ${n} elements with ${minActive}..${maxActive} active`
    ))
  }

  return Ok(Object.freeze({
    candidates: Object.freeze(candidates),
    minActive,
    maxActive,
    poolCap,
    sampledActiveCounts: Object.freeze(sampledActiveCounts),
  }))
}
