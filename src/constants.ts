/**
 * Design limits and generation defaults.
 */

export const MIN_ELEMENTS = 4
export const MAX_ELEMENTS = 16

export const MIN_TASKS_PER_RESPONDENT = 1
export const MAX_TASKS_PER_RESPONDENT = 100

export const MIN_RESPONDENTS = 1
export const MAX_RESPONDENTS = 10_000

/** Allowed study-wide exposure deviation, as a percentage of the mean exposure */
export const DEFAULT_TOLERANCE_PCT = 10

/** Total candidate budget, split evenly across the active-count range */
export const DEFAULT_POOL_CAP = 1024

/** Pool cap multiplier applied on the single automatic retry */
export const POOL_CAP_GROWTH = 4

export const MAX_ATTEMPTS = 2

/** Tasks-per-respondent ceiling used by the planner for studies of up to 16 elements */
export const SUGGESTED_TASKS_CAP = 24

export const DEFAULT_MIN_ACTIVE = 2
export const DEFAULT_MAX_ACTIVE = 4
