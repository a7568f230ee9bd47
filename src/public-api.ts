/**
 * Public API Module
 *
 * Consumer-facing study planner: ties configuration, the candidate pool cache,
 * matrix generation, event emission and the matrix store together.
 */

import type { StudyDesignParams, StudyMatrix, StudyId, Seed } from './types'
import type { MatrixStore, StoredStudyMatrix, StudyMatrixSummary } from './adapter'
import type { ElementSet } from './element-set'
import { defaultLabels } from './element-set'
import { buildCandidatePool, poolKey, type CandidatePool } from './candidate-pool'
import { generateWithReport, type GenerationEvent, type GenerationReport } from './respondent-assigner'
import { InvalidConfigurationError, DuplicateKeyError, type IpedError, type InfeasibleDesignError } from './errors'
import { type Result, Ok } from './result'

export type { MatrixStore } from './adapter'

// ============================================================================
// Types
// ============================================================================

export type StudyPlannerConfig = {
  store: MatrixStore
  tolerancePct?: number
  poolCap?: number
  timeoutMs?: number
  /** Clock used for timeouts and createdAt stamps */
  now?: () => number
}

export type GenerateStudyOptions = {
  seed?: Seed
  labels?: readonly string[]
}

export type PlannerEventMap = {
  poolBuilt: { studyId: string; poolSize: number; poolCap: number; cached: boolean }
  retry: { studyId: string; attempt: number; reason: string; poolCap: number }
  generated: { studyId: string; attempts: number; maxDeviation: number; allowedDeviation: number }
  /** Generation errors are IpedErrors; store failures pass through as thrown */
  failed: { studyId: string; error: Error }
}

export type PlannerEvent = keyof PlannerEventMap

export type StudyPlanner = {
  generateStudy(studyId: string, params: StudyDesignParams, options?: GenerateStudyOptions): Promise<StudyMatrix>
  getStudyMatrix(studyId: string): Promise<StoredStudyMatrix | null>
  listStudies(): Promise<StudyMatrixSummary[]>
  deleteStudy(studyId: string): Promise<void>
  on<E extends PlannerEvent>(event: E, handler: (payload: PlannerEventMap[E]) => void): () => void
  /** Number of cached candidate pools */
  poolCacheSize(): number
}

// ============================================================================
// Factory
// ============================================================================

export function createStudyPlanner(config: StudyPlannerConfig): StudyPlanner {
  const { store } = config
  const now = config.now ?? Date.now

  // Pools are pure in their key, so they are shared across studies
  const poolCache = new Map<string, CandidatePool>()

  // Event handlers
  const eventHandlers: { [E in PlannerEvent]: ((payload: PlannerEventMap[E]) => void)[] } = {
    poolBuilt: [],
    retry: [],
    generated: [],
    failed: [],
  }

  function emit<E extends PlannerEvent>(event: E, payload: PlannerEventMap[E]): boolean {
    let hadErrors = false
    for (const handler of [...eventHandlers[event]]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<E extends PlannerEvent>(event: E, handler: (payload: PlannerEventMap[E]) => void): () => void {
    eventHandlers[event].push(handler)
    return () => {
      const list = eventHandlers[event]
      const idx = list.indexOf(handler)
      if (idx !== -1) list.splice(idx, 1)
    }
  }

  function cachedPool(studyId: string) {
    return (
      elements: ElementSet,
      minActive: number,
      maxActive: number,
      poolCap: number
    ): Result<CandidatePool, InfeasibleDesignError> => {
      const key = poolKey(elements.size, minActive, maxActive, poolCap)
      const hit = poolCache.get(key)
      if (hit) {
        emit('poolBuilt', { studyId, poolSize: hit.candidates.length, poolCap, cached: true })
        return Ok(hit)
      }
      const built = buildCandidatePool(elements, minActive, maxActive, poolCap)
      if (built.ok) {
        poolCache.set(key, built.value)
        emit('poolBuilt', { studyId, poolSize: built.value.candidates.length, poolCap, cached: false })
      }
      return built
    }
  }

  function forwardEvent(studyId: string, event: GenerationEvent): void {
    if (event.type === 'retry') {
      emit('retry', { studyId, attempt: event.attempt, reason: event.reason, poolCap: event.poolCap })
    }
  }

  async function generateStudy(
    studyId: string,
    params: StudyDesignParams,
    options: GenerateStudyOptions = {}
  ): Promise<StudyMatrix> {
    if (studyId.trim() === '') {
      throw new InvalidConfigurationError('studyId must be non-empty')
    }
    if (await store.getStudyMatrix(studyId)) {
      throw new DuplicateKeyError(`Study '${studyId}' already has a matrix`)
    }

    const result: Result<GenerationReport, IpedError> = generateWithReport(params, {
      ...(options.seed !== undefined ? { seed: options.seed } : {}),
      ...(options.labels ? { labels: options.labels } : {}),
      ...(config.tolerancePct !== undefined ? { tolerancePct: config.tolerancePct } : {}),
      ...(config.poolCap !== undefined ? { poolCap: config.poolCap } : {}),
      ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      now,
      poolProvider: cachedPool(studyId),
      onEvent: (event) => forwardEvent(studyId, event),
    })

    if (!result.ok) {
      emit('failed', { studyId, error: result.error })
      throw result.error
    }

    const report = result.value
    try {
      await store.saveStudyMatrix({
        studyId: studyId as StudyId,
        params: { ...params },
        labels: options.labels ? [...options.labels] : defaultLabels(params.numElements),
        seed: report.seed,
        matrix: report.matrix,
        createdAt: new Date(now()).toISOString(),
      })
    } catch (e) {
      emit('failed', { studyId, error: e instanceof Error ? e : new Error(String(e)) })
      throw e
    }

    emit('generated', {
      studyId,
      attempts: report.attempts,
      maxDeviation: report.maxDeviation,
      allowedDeviation: report.allowedDeviation,
    })
    return report.matrix
  }

  return {
    generateStudy,
    getStudyMatrix: (studyId) => store.getStudyMatrix(studyId),
    listStudies: () => store.listStudyMatrices(),
    deleteStudy: (studyId) => store.deleteStudyMatrix(studyId),
    on,
    poolCacheSize: () => poolCache.size,
  }
}
