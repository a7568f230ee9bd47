/**
 * Exposure Tally
 *
 * Owned accumulator of per-element exposure counts. One instance tracks the
 * study-wide totals and is threaded through every scheduling call; short-lived
 * instances track a single respondent's own sequence.
 */

import { isActive } from './element-set'

export class ExposureTally {
  private readonly counts: Int32Array
  private total = 0
  private tasks = 0

  constructor(readonly size: number) {
    this.counts = new Int32Array(size)
  }

  add(mask: number): void {
    for (let e = 0; e < this.size; e++) {
      if (isActive(mask, e)) {
        this.counts[e] = (this.counts[e] ?? 0) + 1
        this.total++
      }
    }
    this.tasks++
  }

  countOf(element: number): number {
    return this.counts[element] ?? 0
  }

  get totalExposures(): number {
    return this.total
  }

  get taskCount(): number {
    return this.tasks
  }

  get mean(): number {
    return this.total / this.size
  }

  snapshot(): number[] {
    return Array.from(this.counts)
  }

  /** Largest |count - mean| over all elements */
  maxDeviation(): number {
    const mean = this.mean
    let worst = 0
    for (let e = 0; e < this.size; e++) {
      worst = Math.max(worst, Math.abs(this.countOf(e) - mean))
    }
    return worst
  }

  /**
   * n * count - total for every element: the deviation from the mean, scaled by
   * the element count so comparisons stay in exact integers.
   */
  scaledOffsets(): Int32Array {
    const offsets = new Int32Array(this.size)
    for (let e = 0; e < this.size; e++) {
      offsets[e] = this.size * this.countOf(e) - this.total
    }
    return offsets
  }
}
