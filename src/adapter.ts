/**
 * Matrix Store Adapter
 *
 * Persistence interface for generated study matrices + in-memory mock
 * implementation. All methods are async so sync (better-sqlite3) and remote
 * stores share one contract.
 */

import type { StudyDesignParams, StudyMatrix, StudyId } from './types'
import { DuplicateKeyError, NotFoundError } from './errors'

export { DuplicateKeyError, NotFoundError, InvalidDataError } from './errors'

// ============================================================================
// Entity Types
// ============================================================================

export type StoredStudyMatrix = {
  studyId: StudyId
  params: StudyDesignParams
  /** Element labels, in element order */
  labels: readonly string[]
  seed: string
  matrix: StudyMatrix
  /** ISO-8601 timestamp */
  createdAt: string
}

export type StudyMatrixSummary = {
  studyId: StudyId
  params: StudyDesignParams
  seed: string
  createdAt: string
}

// ============================================================================
// Store Interface
// ============================================================================

export interface MatrixStore {
  /** Throws DuplicateKeyError when the study already has a matrix */
  saveStudyMatrix(record: StoredStudyMatrix): Promise<void>
  getStudyMatrix(studyId: string): Promise<StoredStudyMatrix | null>
  /** Ordered by study id */
  listStudyMatrices(): Promise<StudyMatrixSummary[]>
  /** Throws NotFoundError when the study has no matrix */
  deleteStudyMatrix(studyId: string): Promise<void>
}

// ============================================================================
// Mock Implementation
// ============================================================================

export function createMockStore(): MatrixStore {
  const records = new Map<string, StoredStudyMatrix>()

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  return {
    async saveStudyMatrix(record) {
      if (records.has(record.studyId)) {
        throw new DuplicateKeyError(`Study '${record.studyId}' already has a matrix`)
      }
      records.set(record.studyId, clone(record))
    },

    async getStudyMatrix(studyId) {
      const record = records.get(studyId)
      return record ? clone(record) : null
    },

    async listStudyMatrices() {
      return [...records.values()]
        .sort((a, b) => (a.studyId < b.studyId ? -1 : a.studyId > b.studyId ? 1 : 0))
        .map(({ studyId, params, seed, createdAt }) => ({
          studyId, params: clone(params), seed, createdAt,
        }))
    },

    async deleteStudyMatrix(studyId) {
      if (!records.delete(studyId)) {
        throw new NotFoundError(`Study '${studyId}' has no matrix`)
      }
    },
  }
}
