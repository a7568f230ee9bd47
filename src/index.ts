/**
 * iped-matrix
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  IpedError, IpedErrorCode,
  InvalidConfigurationError, InfeasibleDesignError, InfeasibleBalanceError,
  DuplicateKeyError, NotFoundError, InvalidDataError,
} from './errors'
export type { IpedErrorCode as IpedErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Shared types
export type {
  StudyId, StudyDesignParams, Seed,
  Exposure, TaskRecord, RespondentMatrix, StudyMatrix,
} from './types'

// Constants
export {
  MIN_ELEMENTS, MAX_ELEMENTS,
  MIN_TASKS_PER_RESPONDENT, MAX_TASKS_PER_RESPONDENT,
  MIN_RESPONDENTS, MAX_RESPONDENTS,
  DEFAULT_TOLERANCE_PCT, DEFAULT_POOL_CAP, POOL_CAP_GROWTH, MAX_ATTEMPTS,
} from './constants'

// Element set
export type { ElementSet } from './element-set'
export { createElementSet, defaultLabels, popcount, activeIndices } from './element-set'

// Design parameters
export { validateDesignParams, defaultSeed, resolveSeed } from './design-params'

// Candidate pool
export type { CandidateTask, CandidatePool } from './candidate-pool'
export { buildCandidatePool, perActiveCountCap, poolKey } from './candidate-pool'

// Balance scheduling
export { ExposureTally } from './exposure-tally'
export type { ScheduleOptions, StudySchedule, CandidateScore } from './balance-scheduler'
export { scheduleRespondent, scheduleStudy, allowedDeviation, scoreCandidate } from './balance-scheduler'
export type { Rng } from './rng'
export { createRng } from './rng'

// Generation
export type {
  GenerationState, GenerationEvent, GenerateOptions, GenerationReport, PoolProvider,
} from './respondent-assigner'
export { generate, generateWithReport } from './respondent-assigner'

// Validation
export type {
  InvariantName, ValidationViolation, ValidationReport, ExposureSummary,
} from './validator'
export { validateStudyMatrix, summarizeExposure } from './validator'

// Serialization
export {
  buildStudyMatrix, serializeStudyMatrix, parseStudyMatrix, parseTaskRecord, taskId, toElementsShown,
} from './serialization'

// Planning
export type { PlanInput } from './planner'
export { binomial, visibleCapacity, suggestTasksPerRespondent, planStudyDesign } from './planner'

// Matrix store (persistence interface + in-memory mock)
export type { MatrixStore, StoredStudyMatrix, StudyMatrixSummary } from './adapter'
export { createMockStore } from './adapter'

// SQLite store
export type { SqliteStore } from './sqlite-adapter'
export { createSqliteStore } from './sqlite-adapter'

// Public API
export type {
  StudyPlanner, StudyPlannerConfig, GenerateStudyOptions, PlannerEvent, PlannerEventMap,
} from './public-api'
export { createStudyPlanner } from './public-api'
