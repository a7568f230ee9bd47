/**
 * Matrix Serialization
 *
 * Converts between internal bitmask schedules and the wire StudyMatrix, and
 * to and from JSON text.
 */

import type { Exposure, RespondentMatrix, StudyMatrix, TaskRecord } from './types'
import { type ElementSet, isActive } from './element-set'
import { InvalidDataError } from './errors'
import { type Result, Ok, Err } from './result'

// ============================================================================
// Bitmask → Wire
// ============================================================================

export function taskId(respondent: number, taskIndex: number): string {
  return `${respondent}_${taskIndex}`
}

/** Built with fromEntries so any label, `__proto__` included, becomes an own key */
export function toElementsShown(mask: number, elements: ElementSet): Record<string, Exposure> {
  return Object.fromEntries(
    elements.labels.map((label, i): [string, Exposure] => [label, isActive(mask, i) ? 1 : 0])
  )
}

/** Builds a deep-frozen StudyMatrix from masks indexed [respondent][taskIndex] */
export function buildStudyMatrix(
  schedule: readonly (readonly number[])[],
  elements: ElementSet
): StudyMatrix {
  const matrix: Record<string, RespondentMatrix> = {}
  schedule.forEach((masks, r) => {
    const tasks: TaskRecord[] = masks.map((mask, i) => Object.freeze({
      task_id: taskId(r, i),
      elements_shown: Object.freeze(toElementsShown(mask, elements)),
      task_index: i,
    }))
    matrix[String(r)] = Object.freeze(tasks)
  })
  return Object.freeze(matrix)
}

// ============================================================================
// JSON
// ============================================================================

function respondentOrder(matrix: StudyMatrix): string[] {
  return Object.keys(matrix).sort((a, b) => Number(a) - Number(b))
}

export function serializeStudyMatrix(matrix: StudyMatrix): string {
  const ordered: Record<string, RespondentMatrix> = {}
  for (const key of respondentOrder(matrix)) {
    const tasks = matrix[key]
    if (tasks) ordered[key] = tasks
  }
  return JSON.stringify(ordered)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseTaskRecord(raw: unknown, where: string): Result<TaskRecord, InvalidDataError> {
  if (!isRecord(raw)) return Err(new InvalidDataError(`${where}: task must be an object`))
  const { task_id, elements_shown, task_index } = raw
  if (typeof task_id !== 'string') {
    return Err(new InvalidDataError(`${where}: task_id must be a string`))
  }
  if (typeof task_index !== 'number' || !Number.isInteger(task_index) || task_index < 0) {
    return Err(new InvalidDataError(`${where}: task_index must be a non-negative integer`))
  }
  if (!isRecord(elements_shown)) {
    return Err(new InvalidDataError(`${where}: elements_shown must be an object`))
  }
  const entries: [string, Exposure][] = []
  for (const [label, value] of Object.entries(elements_shown)) {
    if (value !== 0 && value !== 1) {
      return Err(new InvalidDataError(`${where}: elements_shown.${label} must be 0 or 1`))
    }
    entries.push([label, value])
  }
  return Ok({ task_id, elements_shown: Object.fromEntries(entries), task_index })
}

export function parseStudyMatrix(json: string): Result<StudyMatrix, InvalidDataError> {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (e) {
    return Err(new InvalidDataError(`Matrix is not valid JSON: ${e instanceof Error ? e.message : String(e)}`))
  }
  if (!isRecord(raw)) return Err(new InvalidDataError('Matrix must be an object keyed by respondent'))

  const matrix: Record<string, RespondentMatrix> = {}
  for (const [respondent, tasks] of Object.entries(raw)) {
    if (!/^(0|[1-9]\d*)$/.test(respondent)) {
      return Err(new InvalidDataError(`Invalid respondent key '${respondent}'`))
    }
    if (!Array.isArray(tasks)) {
      return Err(new InvalidDataError(`Respondent ${respondent}: tasks must be an array`))
    }
    const parsed: TaskRecord[] = []
    for (let i = 0; i < tasks.length; i++) {
      const task = parseTaskRecord(tasks[i], `Respondent ${respondent}, task ${i}`)
      if (!task.ok) return task
      parsed.push(task.value)
    }
    matrix[respondent] = parsed
  }
  return Ok(matrix)
}
