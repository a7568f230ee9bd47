/**
 * Shared Types
 *
 * Study design parameters and the wire shape of the generated matrix.
 */

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __studyId: unique symbol

export type StudyId = string & { readonly [__studyId]: true }

// ============================================================================
// Design Parameters
// ============================================================================

export type StudyDesignParams = {
  numElements: number
  tasksPerRespondent: number
  numRespondents: number
  minActive: number
  maxActive: number
}

export type Seed = string | number

// ============================================================================
// Matrix (wire shape)
// ============================================================================

/** 0 = hidden, 1 = shown */
export type Exposure = 0 | 1

export type TaskRecord = {
  readonly task_id: string
  readonly elements_shown: Readonly<Record<string, Exposure>>
  readonly task_index: number
}

export type RespondentMatrix = readonly TaskRecord[]

/** Respondent index ("0".."R-1") to that respondent's ordered tasks */
export type StudyMatrix = Readonly<Record<string, RespondentMatrix>>
