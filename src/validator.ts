/**
 * Matrix Validator
 *
 * Re-checks a finished StudyMatrix against its design before it is handed to
 * the caller. Reports the first violation found, in respondent/task order.
 * Runs in O(respondents x tasks x elements).
 */

import type { StudyDesignParams, StudyMatrix } from './types'
import type { ElementSet } from './element-set'
import { allowedDeviation } from './balance-scheduler'

// ============================================================================
// Types
// ============================================================================

export type InvariantName = 'shape' | 'activeCount' | 'taskSequence' | 'balance'

export type ValidationViolation = {
  invariant: InvariantName
  message: string
  respondent?: string
  taskIndex?: number
}

export type ValidationReport =
  | { valid: true }
  | ({ valid: false } & ValidationViolation)

export type ExposureSummary = {
  /** Study-wide exposure count per element label */
  counts: Record<string, number>
  mean: number
  maxDeviation: number
}

// ============================================================================
// Exposure Summary
// ============================================================================

export function summarizeExposure(matrix: StudyMatrix, elements: ElementSet): ExposureSummary {
  const tallies = elements.labels.map(() => 0)
  let total = 0
  for (const tasks of Object.values(matrix)) {
    for (const task of tasks) {
      elements.labels.forEach((label, e) => {
        if (Object.hasOwn(task.elements_shown, label) && task.elements_shown[label] === 1) {
          tallies[e] = (tallies[e] ?? 0) + 1
          total++
        }
      })
    }
  }

  const mean = total / elements.size
  let maxDeviation = 0
  for (const count of tallies) {
    maxDeviation = Math.max(maxDeviation, Math.abs(count - mean))
  }
  const counts = Object.fromEntries(
    elements.labels.map((label, e): [string, number] => [label, tallies[e] ?? 0])
  )
  return { counts, mean, maxDeviation }
}

// ============================================================================
// Validation
// ============================================================================

function fail(v: ValidationViolation): ValidationReport {
  return { valid: false, ...v }
}

export function validateStudyMatrix(
  matrix: StudyMatrix,
  params: StudyDesignParams,
  elements: ElementSet,
  tolerancePct: number
): ValidationReport {
  const keys = Object.keys(matrix)
  if (keys.length !== params.numRespondents) {
    return fail({
      invariant: 'shape',
      message: `Expected ${params.numRespondents} respondents, found ${keys.length}`,
    })
  }

  const labelSet = new Set(elements.labels)
  const seenIds = new Set<string>()

  for (let r = 0; r < params.numRespondents; r++) {
    const respondent = String(r)
    const tasks = matrix[respondent]
    if (!tasks) {
      return fail({ invariant: 'shape', respondent, message: `Missing respondent '${respondent}'` })
    }
    if (tasks.length !== params.tasksPerRespondent) {
      return fail({
        invariant: 'taskSequence',
        respondent,
        message: `Respondent ${respondent} has ${tasks.length} tasks, expected ${params.tasksPerRespondent}`,
      })
    }

    for (let i = 0; i < tasks.length; i++) {
      const task = tasks[i]
      if (!task) {
        return fail({ invariant: 'shape', respondent, taskIndex: i, message: `Missing task ${i}` })
      }

      if (task.task_index !== i) {
        return fail({
          invariant: 'taskSequence',
          respondent,
          taskIndex: i,
          message: `Task at position ${i} has task_index ${task.task_index}`,
        })
      }
      const expectedId = `${respondent}_${i}`
      if (task.task_id !== expectedId || seenIds.has(task.task_id)) {
        return fail({
          invariant: 'taskSequence',
          respondent,
          taskIndex: i,
          message: `Task id '${task.task_id}' is duplicated or not '${expectedId}'`,
        })
      }
      seenIds.add(task.task_id)

      const shownKeys = Object.keys(task.elements_shown)
      let active = 0
      for (const key of shownKeys) {
        const value = task.elements_shown[key]
        if (!labelSet.has(key) || (value !== 0 && value !== 1)) {
          return fail({
            invariant: 'shape',
            respondent,
            taskIndex: i,
            message: `Unexpected element entry '${key}': ${String(value)}`,
          })
        }
        active += value
      }
      if (shownKeys.length !== elements.size) {
        return fail({
          invariant: 'shape',
          respondent,
          taskIndex: i,
          message: `Task lists ${shownKeys.length} elements, expected ${elements.size}`,
        })
      }

      if (active < params.minActive || active > params.maxActive) {
        return fail({
          invariant: 'activeCount',
          respondent,
          taskIndex: i,
          message: `Task has ${active} active elements, outside [${params.minActive}, ${params.maxActive}]`,
        })
      }
    }
  }

  const summary = summarizeExposure(matrix, elements)
  const allowed = allowedDeviation(summary.mean, tolerancePct)
  if (summary.maxDeviation > allowed) {
    return fail({
      invariant: 'balance',
      message: `Exposure deviation ${summary.maxDeviation.toFixed(2)} exceeds allowed ${allowed.toFixed(2)}`,
    })
  }

  return { valid: true }
}
