/**
 * Balance Scheduler
 *
 * Greedy per-slot selection from the shared candidate pool. Each slot takes the
 * candidate that minimizes, in order:
 *   1. the study-wide max exposure deviation after selection
 *   2. the respondent's own max exposure deviation after selection
 *   3. the study-wide sum of squared deviations after selection
 * Remaining ties are broken by a draw from the seeded PRNG. A respondent does
 * not repeat a candidate until it has used every candidate in the pool.
 */

import type { CandidatePool } from './candidate-pool'
import type { StudyDesignParams } from './types'
import { ExposureTally } from './exposure-tally'
import { InfeasibleBalanceError, InfeasibleDesignError } from './errors'
import { type Result, Ok, Err } from './result'
import type { Rng } from './rng'

// ============================================================================
// Types
// ============================================================================

export type ScheduleOptions = {
  tolerancePct: number
  /** Polled between respondents; returning true aborts the whole schedule */
  shouldAbort?: () => boolean
}

/** Scaled deviations after a candidate is added */
export type CandidateScore = {
  studyMax: number
  ownMax: number
  /** Study-wide sum of squared scaled deviations */
  spread: number
}

export type StudySchedule = {
  /** Selected bitmasks, indexed [respondent][taskIndex] */
  readonly respondents: readonly (readonly number[])[]
  readonly exposure: readonly number[]
  readonly maxDeviation: number
  readonly allowedDeviation: number
}

// ============================================================================
// Tolerance
// ============================================================================

/** Never below one exposure: integer totals rarely divide evenly across elements */
export function allowedDeviation(mean: number, tolerancePct: number): number {
  return Math.max((mean * tolerancePct) / 100, 1)
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Scores a candidate against precomputed scaled offsets in a single pass.
 * Adding a task with k active elements moves every offset by -k, plus n for
 * the elements it shows.
 */
export function scoreCandidate(
  studyOffsets: Int32Array,
  ownOffsets: Int32Array,
  mask: number,
  activeCount: number
): CandidateScore {
  const size = studyOffsets.length
  let studyMax = 0
  let ownMax = 0
  let spread = 0
  for (let e = 0; e < size; e++) {
    const shift = ((mask >>> e) & 1) === 1 ? size - activeCount : -activeCount
    const s = (studyOffsets[e] ?? 0) + shift
    const o = (ownOffsets[e] ?? 0) + shift
    const sAbs = s < 0 ? -s : s
    const oAbs = o < 0 ? -o : o
    if (sAbs > studyMax) studyMax = sAbs
    if (oAbs > ownMax) ownMax = oAbs
    spread += s * s
  }
  return { studyMax, ownMax, spread }
}

// ============================================================================
// Per-Respondent Selection
// ============================================================================

export function scheduleRespondent(
  pool: CandidatePool,
  study: ExposureTally,
  tasksPerRespondent: number,
  rng: Rng
): number[] {
  const { candidates } = pool
  const own = new ExposureTally(study.size)
  const used = new Uint8Array(candidates.length)
  let usedCount = 0
  const sequence: number[] = []

  for (let slot = 0; slot < tasksPerRespondent; slot++) {
    if (usedCount === candidates.length) {
      used.fill(0)
      usedCount = 0
    }

    const studyOffsets = study.scaledOffsets()
    const ownOffsets = own.scaledOffsets()
    let bestStudy = Infinity
    let bestOwn = Infinity
    let bestSpread = Infinity
    let ties: number[] = []

    for (let idx = 0; idx < candidates.length; idx++) {
      if (used[idx] === 1) continue
      const cand = candidates[idx]
      if (!cand) continue

      const { studyMax, ownMax, spread } = scoreCandidate(studyOffsets, ownOffsets, cand.mask, cand.activeCount)
      if (studyMax > bestStudy) continue
      if (studyMax === bestStudy) {
        if (ownMax > bestOwn) continue
        if (ownMax === bestOwn && spread > bestSpread) continue
      }

      if (studyMax < bestStudy || ownMax < bestOwn || spread < bestSpread) {
        bestStudy = studyMax
        bestOwn = ownMax
        bestSpread = spread
        ties = [idx]
      } else {
        ties.push(idx)
      }
    }

    const chosenIdx = rng.pick(ties)
    const chosen = candidates[chosenIdx]
    if (!chosen) throw new Error(`Candidate index ${chosenIdx} out of range`)

    used[chosenIdx] = 1
    usedCount++
    study.add(chosen.mask)
    own.add(chosen.mask)
    sequence.push(chosen.mask)
  }

  return sequence
}

// ============================================================================
// Whole-Study Schedule
// ============================================================================

export function scheduleStudy(
  params: StudyDesignParams,
  pool: CandidatePool,
  rng: Rng,
  options: ScheduleOptions
): Result<StudySchedule, InfeasibleBalanceError | InfeasibleDesignError> {
  const study = new ExposureTally(params.numElements)
  const respondents: number[][] = []

  for (let r = 0; r < params.numRespondents; r++) {
    if (options.shouldAbort?.()) {
      return Err(new InfeasibleDesignError(
        `Generation aborted after ${r} of ${params.numRespondents} respondents (timeout)`
      ))
    }
    respondents.push(scheduleRespondent(pool, study, params.tasksPerRespondent, rng))
  }

  const maxDeviation = study.maxDeviation()
  const allowed = allowedDeviation(study.mean, options.tolerancePct)
  if (maxDeviation > allowed) {
    return Err(new InfeasibleBalanceError(
      `Exposure deviation ${maxDeviation.toFixed(2)} exceeds allowed ${allowed.toFixed(2)} ` +
      `with a pool of ${pool.candidates.length} candidates; widen minActive/maxActive or raise the pool cap`,
      maxDeviation,
      allowed
    ))
  }

  return Ok({
    respondents,
    exposure: study.snapshot(),
    maxDeviation,
    allowedDeviation: allowed,
  })
}
