/**
 * Design Parameter Validation
 *
 * Range checks applied before any generation work starts.
 */

import type { StudyDesignParams, Seed } from './types'
import { InvalidConfigurationError } from './errors'
import { type Result, Ok, Err } from './result'
import {
  MIN_ELEMENTS, MAX_ELEMENTS,
  MIN_TASKS_PER_RESPONDENT, MAX_TASKS_PER_RESPONDENT,
  MIN_RESPONDENTS, MAX_RESPONDENTS,
} from './constants'

function checkIntRange(name: string, value: number, min: number, max: number): string | null {
  if (!Number.isInteger(value)) return `${name} must be an integer, got ${value}`
  if (value < min || value > max) return `${name} must be in [${min}, ${max}], got ${value}`
  return null
}

export function validateDesignParams(
  params: StudyDesignParams
): Result<StudyDesignParams, InvalidConfigurationError> {
  const problem =
    checkIntRange('numElements', params.numElements, MIN_ELEMENTS, MAX_ELEMENTS) ??
    checkIntRange('tasksPerRespondent', params.tasksPerRespondent, MIN_TASKS_PER_RESPONDENT, MAX_TASKS_PER_RESPONDENT) ??
    checkIntRange('numRespondents', params.numRespondents, MIN_RESPONDENTS, MAX_RESPONDENTS) ??
    checkIntRange('minActive', params.minActive, 1, params.numElements) ??
    checkIntRange('maxActive', params.maxActive, 1, params.numElements)
  if (problem) return Err(new InvalidConfigurationError(problem))

  if (params.minActive > params.maxActive) {
    return Err(new InvalidConfigurationError(
      `minActive (${params.minActive}) must not exceed maxActive (${params.maxActive})`
    ))
  }

  return Ok({
    numElements: params.numElements,
    tasksPerRespondent: params.tasksPerRespondent,
    numRespondents: params.numRespondents,
    minActive: params.minActive,
    maxActive: params.maxActive,
  })
}

/** Study-specific seed used when the caller supplies none */
export function defaultSeed(params: StudyDesignParams): string {
  return `iped:${params.numElements}:${params.tasksPerRespondent}:${params.numRespondents}:${params.minActive}:${params.maxActive}`
}

export function resolveSeed(params: StudyDesignParams, seed?: Seed): string {
  return seed === undefined ? defaultSeed(params) : String(seed)
}
