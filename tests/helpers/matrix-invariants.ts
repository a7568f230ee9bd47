/**
 * Shared StudyMatrix assertions for tests that generate matrices.
 */
import { expect } from 'vitest'
import type { StudyDesignParams, StudyMatrix } from '../../src/types'

/** Number of elements shown in a task */
export function activeCount(shown: Readonly<Record<string, number>>): number {
  return Object.values(shown).reduce((sum, v) => sum + v, 0)
}

/**
 * Asserts the structural invariants of a generated matrix:
 * 1. Respondent keys are exactly "0".."R-1"
 * 2. Each respondent has tasksPerRespondent tasks with task_index 0..T-1
 * 3. task_id is "{respondent}_{task_index}" and unique study-wide
 * 4. Active count of every task is within [minActive, maxActive]
 */
export function assertMatrixInvariants(matrix: StudyMatrix, params: StudyDesignParams): void {
  expect(Object.keys(matrix).sort((a, b) => Number(a) - Number(b)))
    .toEqual(Array.from({ length: params.numRespondents }, (_, r) => String(r)))

  const ids = new Set<string>()
  for (const [respondent, tasks] of Object.entries(matrix)) {
    expect(tasks).toHaveLength(params.tasksPerRespondent)
    tasks.forEach((task, i) => {
      expect(task.task_index).toBe(i)
      expect(task.task_id).toBe(`${respondent}_${i}`)
      ids.add(task.task_id)

      expect(Object.keys(task.elements_shown)).toHaveLength(params.numElements)
      const active = activeCount(task.elements_shown)
      expect(active).toBeGreaterThanOrEqual(params.minActive)
      expect(active).toBeLessThanOrEqual(params.maxActive)
    })
  }
  expect(ids.size).toBe(params.numRespondents * params.tasksPerRespondent)
}
