/**
 * Element Set
 *
 * Immutable description of a study's elements. Elements are addressed by
 * ordinal index internally; labels only appear at the serialization boundary.
 */

import { InvalidConfigurationError } from './errors'
import { MIN_ELEMENTS, MAX_ELEMENTS } from './constants'

export type ElementSet = {
  readonly size: number
  readonly labels: readonly string[]
  /** Bitmask with every element active */
  readonly fullMask: number
}

export function defaultLabels(numElements: number): string[] {
  return Array.from({ length: numElements }, (_, i) => `E${i + 1}`)
}

export function createElementSet(numElements: number, labels?: readonly string[]): ElementSet {
  if (!Number.isInteger(numElements) || numElements < MIN_ELEMENTS || numElements > MAX_ELEMENTS) {
    throw new InvalidConfigurationError(
      `numElements must be an integer in [${MIN_ELEMENTS}, ${MAX_ELEMENTS}], got ${numElements}`
    )
  }

  const resolved = labels ? [...labels] : defaultLabels(numElements)
  if (resolved.length !== numElements) {
    throw new InvalidConfigurationError(
      `Expected ${numElements} element labels, got ${resolved.length}`
    )
  }
  const seen = new Set<string>()
  for (const label of resolved) {
    if (label.trim() === '') {
      throw new InvalidConfigurationError('Element labels must be non-empty')
    }
    if (seen.has(label)) {
      throw new InvalidConfigurationError(`Duplicate element label '${label}'`)
    }
    seen.add(label)
  }

  return Object.freeze({
    size: numElements,
    labels: Object.freeze(resolved),
    fullMask: (1 << numElements) - 1,
  })
}

// ============================================================================
// Bitmask Helpers
// ============================================================================

export function popcount(mask: number): number {
  let count = 0
  let m = mask
  while (m !== 0) {
    m &= m - 1
    count++
  }
  return count
}

export function isActive(mask: number, element: number): boolean {
  return (mask & (1 << element)) !== 0
}

/** Indices of the active elements, ascending */
export function activeIndices(mask: number, size: number): number[] {
  const out: number[] = []
  for (let i = 0; i < size; i++) {
    if (isActive(mask, i)) out.push(i)
  }
  return out
}
