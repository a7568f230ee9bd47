/**
 * Segment 04: Matrix Generation
 *
 * generate() drives one design through pool construction, scheduling,
 * validation and the single retry with a larger pool.
 *
 * Dependencies: Segments 1-3
 */

import { describe, it, expect, vi } from 'vitest'
import { generate, generateWithReport, type GenerationEvent, type PoolProvider } from '../src/respondent-assigner'
import { defaultSeed } from '../src/design-params'
import { serializeStudyMatrix } from '../src/serialization'
import { summarizeExposure } from '../src/validator'
import { createElementSet } from '../src/element-set'
import { buildCandidatePool } from '../src/candidate-pool'
import { Ok, Err } from '../src/result'
import {
  InvalidConfigurationError, InfeasibleDesignError, InfeasibleBalanceError,
} from '../src/errors'
import type { StudyDesignParams, StudyMatrix } from '../src/types'
import { assertMatrixInvariants, activeCount } from './helpers/matrix-invariants'

// ============================================================================
// Test Helpers
// ============================================================================

function design(
  numElements: number,
  tasksPerRespondent: number,
  numRespondents: number,
  minActive: number,
  maxActive: number
): StudyDesignParams {
  return { numElements, tasksPerRespondent, numRespondents, minActive, maxActive }
}

function unwrap(result: ReturnType<typeof generate>): StudyMatrix {
  if (!result.ok) throw result.error
  return result.value
}

/** Provider that always hands back the given masks, whatever the cap */
function fixedPool(masks: number[], activeCount: number, calls: number[]): PoolProvider {
  return (_elements, minActive, maxActive, poolCap) => {
    calls.push(poolCap)
    return Ok({
      candidates: masks.map(mask => ({ mask, activeCount })),
      minActive,
      maxActive,
      poolCap,
      sampledActiveCounts: [],
    })
  }
}

describe('Segment 04: generate', () => {
  // ========================================================================
  // Shape
  // ========================================================================

  describe('shape', () => {
    it('produces a balanced matrix for a tiny design', () => {
      const params = design(4, 4, 2, 1, 2)
      const matrix = unwrap(generate(params, { seed: 42 }))
      assertMatrixInvariants(matrix, params)

      for (const tasks of Object.values(matrix)) {
        for (const task of tasks) expect(activeCount(task.elements_shown)).toBe(2)
      }
      const summary = summarizeExposure(matrix, createElementSet(4))
      expect(summary.counts).toEqual({ E1: 4, E2: 4, E3: 4, E4: 4 })
      expect(summary.maxDeviation).toBe(0)
    })

    it('shows every element in every task when min = max = numElements', () => {
      const matrix = unwrap(generate(design(4, 50, 1, 4, 4)))
      const tasks = matrix['0'] ?? []
      expect(tasks).toHaveLength(50)
      for (const task of tasks) {
        expect(task.elements_shown).toEqual({ E1: 1, E2: 1, E3: 1, E4: 1 })
      }
    })

    it('supports the widest active range', () => {
      const params = design(4, 10, 3, 1, 4)
      assertMatrixInvariants(unwrap(generate(params)), params)
    })

    it('supports the largest element count', () => {
      const params = design(16, 24, 5, 2, 6)
      assertMatrixInvariants(unwrap(generate(params, { seed: 'wide' })), params)
    })

    it('uses custom element labels as keys', () => {
      const matrix = unwrap(generate(design(4, 2, 1, 2, 2), { labels: ['logo', 'price', 'claim', 'photo'] }))
      const task = matrix['0']?.[0]
      expect(Object.keys(task?.elements_shown ?? {})).toEqual(['logo', 'price', 'claim', 'photo'])
    })

    it('accepts labels that collide with Object.prototype keys', () => {
      const labels = ['__proto__', 'constructor', 'toString', 'd']
      const params = design(4, 2, 1, 2, 2)
      const result = generateWithReport(params, { labels })
      expect(result.ok).toBe(true)
      if (!result.ok) return

      for (const task of result.value.matrix['0'] ?? []) {
        expect(Object.keys(task.elements_shown)).toEqual(labels)
        expect(activeCount(task.elements_shown)).toBe(2)
      }
      const summary = summarizeExposure(result.value.matrix, createElementSet(4, labels))
      expect(Object.entries(summary.counts)).toEqual([
        ['__proto__', 1], ['constructor', 1], ['toString', 1], ['d', 1],
      ])
    })

    it('returns a deep-frozen matrix', () => {
      const matrix = unwrap(generate(design(5, 3, 2, 2, 3)))
      const task = matrix['1']?.[2]
      expect(Object.isFrozen(matrix)).toBe(true)
      expect(Object.isFrozen(matrix['1'])).toBe(true)
      expect(Object.isFrozen(task)).toBe(true)
      expect(Object.isFrozen(task?.elements_shown)).toBe(true)
    })
  })

  // ========================================================================
  // Determinism
  // ========================================================================

  describe('determinism', () => {
    const params = design(8, 12, 20, 2, 4)

    it('is byte-identical for the same seed', () => {
      const a = serializeStudyMatrix(unwrap(generate(params, { seed: 'study-7' })))
      const b = serializeStudyMatrix(unwrap(generate(params, { seed: 'study-7' })))
      expect(a).toBe(b)
    })

    it('derives the seed from the design when none is given', () => {
      const implicit = serializeStudyMatrix(unwrap(generate(params)))
      const explicit = serializeStudyMatrix(unwrap(generate(params, { seed: defaultSeed(params) })))
      expect(implicit).toBe(explicit)
    })

    it('treats numeric and string seeds alike', () => {
      const a = serializeStudyMatrix(unwrap(generate(params, { seed: 42 })))
      const b = serializeStudyMatrix(unwrap(generate(params, { seed: '42' })))
      expect(a).toBe(b)
    })

    it('re-randomizes when the seed changes', () => {
      const a = serializeStudyMatrix(unwrap(generate(params, { seed: 'first' })))
      const b = serializeStudyMatrix(unwrap(generate(params, { seed: 'second' })))
      expect(a).not.toBe(b)
    })
  })

  // ========================================================================
  // Balance
  // ========================================================================

  describe('balance', () => {
    it('keeps each element within 10% of the mean exposure', () => {
      const params = design(6, 24, 100, 2, 4)
      const result = generateWithReport(params, { seed: 'balance' })
      expect(result.ok).toBe(true)
      if (!result.ok) return

      const summary = summarizeExposure(result.value.matrix, createElementSet(6))
      for (const count of Object.values(summary.counts)) {
        expect(Math.abs(count - summary.mean)).toBeLessThanOrEqual(0.1 * summary.mean)
      }
      expect(result.value.maxDeviation).toBeCloseTo(summary.maxDeviation)
      expect(result.value.attempts).toBe(1)
      expect(result.value.poolSize).toBe(50)
    })
  })

  // ========================================================================
  // Failure Paths
  // ========================================================================

  describe('failures', () => {
    it('rejects invalid parameters before any work', () => {
      const calls: number[] = []
      const result = generate(design(4, 5, 1, 5, 4), { poolProvider: fixedPool([0b0011], 2, calls) })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidConfigurationError)
        expect(result.error.message).toBe('minActive must be in [1, 4], got 5')
      }
      expect(calls).toEqual([])
    })

    it('rejects mismatched labels as a configuration error', () => {
      const result = generate(design(4, 2, 1, 2, 2), { labels: ['a', 'b'] })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidConfigurationError)
        expect(result.error.message).toBe('Expected 4 element labels, got 2')
      }
    })

    it.each([
      [{ tolerancePct: 0 }, 'tolerancePct must be a positive number, got 0'],
      [{ poolCap: 1.5 }, 'poolCap must be a positive integer, got 1.5'],
      [{ timeoutMs: -1 }, 'timeoutMs must be a positive number, got -1'],
    ])('rejects option %o', (options, message) => {
      const result = generate(design(4, 2, 1, 2, 2), options)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidConfigurationError)
        expect(result.error.message).toBe(message)
      }
    })

    it('retries once with a larger pool, then reports InfeasibleBalance', () => {
      const calls: number[] = []
      const events: GenerationEvent[] = []
      const result = generate(design(4, 4, 1, 2, 2), {
        poolProvider: fixedPool([0b0011], 2, calls),
        onEvent: e => events.push(e),
      })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InfeasibleBalanceError)
        expect(result.error.code).toBe('INFEASIBLE_BALANCE')
      }
      expect(calls).toEqual([1024, 4096])
      expect(events.filter(e => e.type === 'retry')).toHaveLength(1)
      expect(events.at(-1)).toEqual({ type: 'state', state: 'Failed', attempt: 2 })
    })

    it('accepts the design when the larger pool balances it', () => {
      const calls: number[] = []
      const events: GenerationEvent[] = []
      const skewedThenFull: PoolProvider = (elements, minActive, maxActive, poolCap) => {
        calls.push(poolCap)
        return poolCap === 1024
          ? fixedPool([0b0011], 2, [])(elements, minActive, maxActive, poolCap)
          : buildCandidatePool(elements, minActive, maxActive, poolCap)
      }
      const result = generateWithReport(design(4, 4, 1, 2, 2), {
        poolProvider: skewedThenFull,
        onEvent: e => events.push(e),
      })

      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.value.attempts).toBe(2)
        expect(result.value.poolCap).toBe(4096)
        expect(result.value.poolSize).toBe(6)
        expect(result.value.maxDeviation).toBe(0)
      }
      expect(calls).toEqual([1024, 4096])
      const states = events.flatMap(e => (e.type === 'state' ? [e.state] : []))
      expect(states).toEqual([
        'Configured', 'PoolBuilt', 'Scheduling',
        'RetryWithLargerPool', 'PoolBuilt', 'Scheduling', 'Validating', 'Accepted',
      ])
    })

    it('reports a validation failure on the retry as InfeasibleDesign', () => {
      const calls: number[] = []
      const events: GenerationEvent[] = []
      // Single-element candidates slip past the pool but not the validator
      const result = generate(design(4, 4, 1, 2, 2), {
        poolProvider: fixedPool([1, 2, 4, 8], 1, calls),
        onEvent: e => events.push(e),
      })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InfeasibleDesignError)
        expect(result.error.message).toBe(
          "Invariant 'activeCount' failed (respondent 0, task 0): Task has 1 active elements, outside [2, 2]"
        )
      }
      expect(calls).toEqual([1024, 4096])
      expect(events.filter(e => e.type === 'rejected')).toHaveLength(2)
    })

    it('propagates an infeasible pool without retrying', () => {
      const calls: number[] = []
      const provider: PoolProvider = (_elements, _min, _max, poolCap) => {
        calls.push(poolCap)
        return Err(new InfeasibleDesignError('no candidates'))
      }
      const result = generate(design(4, 4, 1, 2, 2), { poolProvider: provider })
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe('no candidates')
      expect(calls).toEqual([1024])
    })

    it('fails with InfeasibleDesign when the time budget runs out', () => {
      let tick = 0
      const now = () => (tick++) * 1000
      const result = generate(design(6, 4, 3, 2, 4), { timeoutMs: 1500, now })
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InfeasibleDesignError)
        expect(result.error.message).toBe('Generation aborted after 1 of 3 respondents (timeout)')
      }
    })
  })

  // ========================================================================
  // Events
  // ========================================================================

  describe('events', () => {
    it('walks the lifecycle states of an accepted design', () => {
      const events: GenerationEvent[] = []
      generate(design(4, 4, 2, 1, 2), { seed: 42, onEvent: e => events.push(e) })
      const states = events.flatMap(e => (e.type === 'state' ? [e.state] : []))
      expect(states).toEqual(['Configured', 'PoolBuilt', 'Scheduling', 'Validating', 'Accepted'])
    })

    it('reports the pool that was built', () => {
      const events: GenerationEvent[] = []
      generate(design(4, 4, 2, 1, 2), { onEvent: e => events.push(e) })
      expect(events.find(e => e.type === 'poolBuilt')).toEqual({
        type: 'poolBuilt', attempt: 1, poolSize: 10, poolCap: 1024, sampledActiveCounts: [],
      })
    })

    it('keeps generating when a handler throws', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const result = generate(design(4, 4, 2, 1, 2), {
        onEvent: () => { throw new Error('handler broke') },
      })
      expect(result.ok).toBe(true)
      expect(spy).toHaveBeenCalled()
      spy.mockRestore()
    })
  })
})
