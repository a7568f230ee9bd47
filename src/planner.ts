/**
 * Design Planner
 *
 * Helpers for choosing design parameters before generation.
 */

import type { StudyDesignParams } from './types'
import { InvalidConfigurationError } from './errors'
import { validateDesignParams } from './design-params'
import { type Result, Err } from './result'
import { binomial } from './internal/combinatorics'
import {
  MIN_ELEMENTS, MAX_ELEMENTS,
  SUGGESTED_TASKS_CAP, DEFAULT_MIN_ACTIVE, DEFAULT_MAX_ACTIVE,
} from './constants'

export { binomial } from './internal/combinatorics'

/** Number of distinct task vectors with minActive..maxActive elements shown */
export function visibleCapacity(numElements: number, minActive: number, maxActive: number): number {
  const lo = Math.max(minActive, 0)
  const hi = Math.min(maxActive, numElements)
  let total = 0
  for (let k = lo; k <= hi; k++) total += binomial(numElements, k)
  return total
}

/**
 * Half the number of K-element combinations, capped at 24, where K is 2 for
 * up to 8 elements and 3 above that.
 */
export function suggestTasksPerRespondent(numElements: number): number {
  if (!Number.isInteger(numElements) || numElements < MIN_ELEMENTS || numElements > MAX_ELEMENTS) {
    throw new InvalidConfigurationError(
      `numElements must be an integer in [${MIN_ELEMENTS}, ${MAX_ELEMENTS}], got ${numElements}`
    )
  }
  const k = numElements <= 8 ? 2 : 3
  return Math.min(SUGGESTED_TASKS_CAP, Math.max(1, Math.floor(binomial(numElements, k) / 2)))
}

export type PlanInput = {
  numElements: number
  numRespondents: number
  minActive?: number
  maxActive?: number
  tasksPerRespondent?: number
}

export function planStudyDesign(input: PlanInput): Result<StudyDesignParams, InvalidConfigurationError> {
  if (!Number.isInteger(input.numElements) || input.numElements < MIN_ELEMENTS || input.numElements > MAX_ELEMENTS) {
    return Err(new InvalidConfigurationError(
      `numElements must be an integer in [${MIN_ELEMENTS}, ${MAX_ELEMENTS}], got ${input.numElements}`
    ))
  }
  return validateDesignParams({
    numElements: input.numElements,
    numRespondents: input.numRespondents,
    minActive: input.minActive ?? DEFAULT_MIN_ACTIVE,
    maxActive: input.maxActive ?? Math.min(DEFAULT_MAX_ACTIVE, input.numElements),
    tasksPerRespondent: input.tasksPerRespondent ?? suggestTasksPerRespondent(input.numElements),
  })
}
