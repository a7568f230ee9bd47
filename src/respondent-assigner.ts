/**
 * Respondent Assigner
 *
 * Drives one generation request through its lifecycle:
 *
 *   Configured → PoolBuilt → Scheduling → Validating
 *     → Accepted
 *     → RetryWithLargerPool → Scheduling (at most once)
 *     → Failed
 *
 * The returned matrix is deep-frozen and is never persisted here.
 */

import type { StudyDesignParams, StudyMatrix, Seed } from './types'
import { createElementSet, type ElementSet } from './element-set'
import { validateDesignParams, resolveSeed } from './design-params'
import { buildCandidatePool, type CandidatePool } from './candidate-pool'
import { scheduleStudy } from './balance-scheduler'
import { validateStudyMatrix, type ValidationViolation } from './validator'
import { buildStudyMatrix } from './serialization'
import { createRng } from './rng'
import {
  IpedError, InfeasibleDesignError, InfeasibleBalanceError, InvalidConfigurationError,
} from './errors'
import { type Result, Ok, Err } from './result'
import { DEFAULT_TOLERANCE_PCT, DEFAULT_POOL_CAP, POOL_CAP_GROWTH, MAX_ATTEMPTS } from './constants'

// ============================================================================
// Types
// ============================================================================

export type GenerationState =
  | 'Configured'
  | 'PoolBuilt'
  | 'Scheduling'
  | 'Validating'
  | 'RetryWithLargerPool'
  | 'Accepted'
  | 'Failed'

export type GenerationEvent =
  | { type: 'state'; state: GenerationState; attempt: number }
  | { type: 'poolBuilt'; attempt: number; poolSize: number; poolCap: number; sampledActiveCounts: readonly number[] }
  | { type: 'retry'; attempt: number; reason: string; poolCap: number }
  | { type: 'rejected'; attempt: number; violation: ValidationViolation }

export type PoolProvider = (
  elements: ElementSet,
  minActive: number,
  maxActive: number,
  poolCap: number
) => Result<CandidatePool, InfeasibleDesignError>

export type GenerateOptions = {
  seed?: Seed
  labels?: readonly string[]
  tolerancePct?: number
  poolCap?: number
  /** Wall-clock budget for the whole call; expiry fails with InfeasibleDesign */
  timeoutMs?: number
  now?: () => number
  onEvent?: (event: GenerationEvent) => void
  /** Candidate pool source; defaults to building a fresh pool */
  poolProvider?: PoolProvider
}

export type GenerationReport = {
  matrix: StudyMatrix
  seed: string
  attempts: number
  poolSize: number
  poolCap: number
  exposure: readonly number[]
  maxDeviation: number
  allowedDeviation: number
}

// ============================================================================
// Option Resolution
// ============================================================================

function checkOptions(options: GenerateOptions): InvalidConfigurationError | null {
  const { tolerancePct, poolCap, timeoutMs } = options
  if (tolerancePct !== undefined && !(Number.isFinite(tolerancePct) && tolerancePct > 0)) {
    return new InvalidConfigurationError(`tolerancePct must be a positive number, got ${tolerancePct}`)
  }
  if (poolCap !== undefined && !(Number.isInteger(poolCap) && poolCap > 0)) {
    return new InvalidConfigurationError(`poolCap must be a positive integer, got ${poolCap}`)
  }
  if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
    return new InvalidConfigurationError(`timeoutMs must be a positive number, got ${timeoutMs}`)
  }
  return null
}

function notify(onEvent: GenerateOptions['onEvent'], event: GenerationEvent): void {
  if (!onEvent) return
  try {
    onEvent(event)
  } catch (e) {
    console.error(`Generation event handler error on '${event.type}':`, e)
  }
}

// ============================================================================
// Generation
// ============================================================================

export function generateWithReport(
  input: StudyDesignParams,
  options: GenerateOptions = {}
): Result<GenerationReport, IpedError> {
  const optionProblem = checkOptions(options)
  if (optionProblem) return Err(optionProblem)

  const validated = validateDesignParams(input)
  if (!validated.ok) return validated
  const params = validated.value

  let elements: ElementSet
  try {
    elements = createElementSet(params.numElements, options.labels)
  } catch (e) {
    if (e instanceof IpedError) return Err(e)
    throw e
  }

  const seed = resolveSeed(params, options.seed)
  const tolerancePct = options.tolerancePct ?? DEFAULT_TOLERANCE_PCT
  const providePool = options.poolProvider ?? buildCandidatePool
  const now = options.now ?? Date.now
  const deadline = options.timeoutMs !== undefined ? now() + options.timeoutMs : undefined
  const shouldAbort = deadline !== undefined ? () => now() > deadline : undefined
  const emit = (event: GenerationEvent) => notify(options.onEvent, event)

  let poolCap = options.poolCap ?? DEFAULT_POOL_CAP
  let lastFailure: IpedError | null = null

  emit({ type: 'state', state: 'Configured', attempt: 1 })

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    if (attempt > 1) {
      poolCap *= POOL_CAP_GROWTH
      emit({ type: 'state', state: 'RetryWithLargerPool', attempt })
      emit({ type: 'retry', attempt, reason: lastFailure?.message ?? 'validation failed', poolCap })
    }

    const pool = providePool(elements, params.minActive, params.maxActive, poolCap)
    if (!pool.ok) {
      emit({ type: 'state', state: 'Failed', attempt })
      return pool
    }
    emit({ type: 'state', state: 'PoolBuilt', attempt })
    emit({
      type: 'poolBuilt',
      attempt,
      poolSize: pool.value.candidates.length,
      poolCap,
      sampledActiveCounts: pool.value.sampledActiveCounts,
    })

    // Each attempt replays the same seed so the result depends only on its inputs
    emit({ type: 'state', state: 'Scheduling', attempt })
    const schedule = scheduleStudy(params, pool.value, createRng(seed), { tolerancePct, shouldAbort })
    if (!schedule.ok) {
      if (schedule.error instanceof InfeasibleBalanceError) {
        lastFailure = schedule.error
        continue
      }
      emit({ type: 'state', state: 'Failed', attempt })
      return schedule
    }

    emit({ type: 'state', state: 'Validating', attempt })
    const matrix = buildStudyMatrix(schedule.value.respondents, elements)
    const report = validateStudyMatrix(matrix, params, elements, tolerancePct)
    if (!report.valid) {
      const { valid: _valid, ...violation } = report
      emit({ type: 'rejected', attempt, violation })
      const where = violation.respondent !== undefined
        ? ` (respondent ${violation.respondent}${violation.taskIndex !== undefined ? `, task ${violation.taskIndex}` : ''})`
        : ''
      lastFailure = new InfeasibleDesignError(`Invariant '${violation.invariant}' failed${where}: ${violation.message}`)
      continue
    }

    emit({ type: 'state', state: 'Accepted', attempt })
    return Ok({
      matrix,
      seed,
      attempts: attempt,
      poolSize: pool.value.candidates.length,
      poolCap,
      exposure: schedule.value.exposure,
      maxDeviation: schedule.value.maxDeviation,
      allowedDeviation: schedule.value.allowedDeviation,
    })
  }

  emit({ type: 'state', state: 'Failed', attempt: MAX_ATTEMPTS })
  return Err(lastFailure ?? new InfeasibleDesignError('Generation failed'))
}

/** Generates the full StudyMatrix for one design, or the typed failure */
export function generate(
  params: StudyDesignParams,
  options: GenerateOptions = {}
): Result<StudyMatrix, IpedError> {
  const result = generateWithReport(params, options)
  return result.ok ? Ok(result.value.matrix) : result
}
