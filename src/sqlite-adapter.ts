/**
 * SQLite Store
 *
 * Production MatrixStore backed by better-sqlite3. One row per study plus one
 * row per generated task; task order is recovered from (respondent, task_index).
 */
import Database from 'better-sqlite3'
import type { MatrixStore, StoredStudyMatrix, StudyMatrixSummary } from './adapter'
import type { StudyId, StudyMatrix, TaskRecord } from './types'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './errors'
import { parseTaskRecord } from './serialization'

export { DuplicateKeyError, InvalidDataError, NotFoundError }

export type SqliteStore = MatrixStore & {
  close(): void
  listTables(): string[]
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS study_matrix (
    study_id TEXT PRIMARY KEY,
    num_elements INTEGER NOT NULL,
    tasks_per_respondent INTEGER NOT NULL,
    num_respondents INTEGER NOT NULL,
    min_active INTEGER NOT NULL,
    max_active INTEGER NOT NULL,
    labels TEXT NOT NULL,
    seed TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS study_task (
    study_id TEXT NOT NULL REFERENCES study_matrix(study_id) ON DELETE CASCADE,
    respondent INTEGER NOT NULL,
    task_index INTEGER NOT NULL,
    task_id TEXT NOT NULL,
    elements_shown TEXT NOT NULL,
    PRIMARY KEY (study_id, respondent, task_index),
    UNIQUE (study_id, task_id)
  );
`

// ============================================================================
// Row Types
// ============================================================================

type StudyMatrixRow = {
  study_id: string
  num_elements: number
  tasks_per_respondent: number
  num_respondents: number
  min_active: number
  max_active: number
  labels: string
  seed: string
  created_at: string
}

type StudyTaskRow = {
  respondent: number
  task_index: number
  task_id: string
  elements_shown: string
}

type TableRow = { name: string }

// ============================================================================
// Row Mapping
// ============================================================================

function parseJson(text: string, where: string): unknown {
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new InvalidDataError(`${where}: stored JSON is malformed (${e instanceof Error ? e.message : String(e)})`)
  }
}

function toLabels(row: StudyMatrixRow): string[] {
  const raw = parseJson(row.labels, `Study '${row.study_id}' labels`)
  if (!Array.isArray(raw) || !raw.every((l): l is string => typeof l === 'string')) {
    throw new InvalidDataError(`Study '${row.study_id}': labels must be a string array`)
  }
  return raw
}

function toSummary(row: StudyMatrixRow): StudyMatrixSummary {
  return {
    studyId: row.study_id as StudyId,
    params: {
      numElements: row.num_elements,
      tasksPerRespondent: row.tasks_per_respondent,
      numRespondents: row.num_respondents,
      minActive: row.min_active,
      maxActive: row.max_active,
    },
    seed: row.seed,
    createdAt: row.created_at,
  }
}

function toMatrix(studyId: string, rows: StudyTaskRow[]): StudyMatrix {
  const matrix: Record<string, TaskRecord[]> = {}
  for (const row of rows) {
    const where = `Study '${studyId}', task '${row.task_id}'`
    const task = parseTaskRecord({
      task_id: row.task_id,
      task_index: row.task_index,
      elements_shown: parseJson(row.elements_shown, where),
    }, where)
    if (!task.ok) throw task.error
    const key = String(row.respondent)
    const list = matrix[key] ?? []
    list.push(task.value)
    matrix[key] = list
  }
  return matrix
}

// ============================================================================
// Factory
// ============================================================================

export function createSqliteStore(path = ':memory:'): SqliteStore {
  const db = new Database(path)
  db.pragma('foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const selectStudy = db.prepare<[string], StudyMatrixRow>('SELECT * FROM study_matrix WHERE study_id = ?')
  const selectAllStudies = db.prepare<[], StudyMatrixRow>('SELECT * FROM study_matrix ORDER BY study_id')
  const selectTasks = db.prepare<[string], StudyTaskRow>(
    'SELECT respondent, task_index, task_id, elements_shown FROM study_task WHERE study_id = ? ORDER BY respondent, task_index',
  )
  const insertStudy = db.prepare<[string, number, number, number, number, number, string, string, string]>(
    'INSERT INTO study_matrix (study_id, num_elements, tasks_per_respondent, num_respondents, min_active, max_active, labels, seed, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
  )
  const insertTask = db.prepare<[string, number, number, string, string]>(
    'INSERT INTO study_task (study_id, respondent, task_index, task_id, elements_shown) VALUES (?, ?, ?, ?, ?)',
  )
  const deleteStudy = db.prepare<[string]>('DELETE FROM study_matrix WHERE study_id = ?')

  const saveAll = db.transaction((record: StoredStudyMatrix) => {
    if (selectStudy.get(record.studyId)) {
      throw new DuplicateKeyError(`Study '${record.studyId}' already has a matrix`)
    }
    const { params } = record
    insertStudy.run(
      record.studyId,
      params.numElements,
      params.tasksPerRespondent,
      params.numRespondents,
      params.minActive,
      params.maxActive,
      JSON.stringify(record.labels),
      record.seed,
      record.createdAt,
    )
    for (const [respondent, tasks] of Object.entries(record.matrix)) {
      for (const task of tasks) {
        insertTask.run(
          record.studyId,
          Number(respondent),
          task.task_index,
          task.task_id,
          JSON.stringify(task.elements_shown),
        )
      }
    }
  })

  return {
    async saveStudyMatrix(record) {
      saveAll(record)
    },

    async getStudyMatrix(studyId) {
      const row = selectStudy.get(studyId)
      if (!row) return null
      return {
        ...toSummary(row),
        labels: toLabels(row),
        matrix: toMatrix(studyId, selectTasks.all(studyId)),
      }
    },

    async listStudyMatrices() {
      return selectAllStudies.all().map(toSummary)
    },

    async deleteStudyMatrix(studyId) {
      const info = deleteStudy.run(studyId)
      if (info.changes === 0) {
        throw new NotFoundError(`Study '${studyId}' has no matrix`)
      }
    },

    close() {
      db.close()
    },

    listTables() {
      return db
        .prepare<[], TableRow>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
        .all()
        .map(r => r.name)
    },
  }
}
