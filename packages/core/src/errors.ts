export type PlanIssueKind = 'MissingData' | 'AmbiguousBuilding' | 'InvalidTimeWindow'

// Non-fatal findings collected while a plan is synthesized
export interface PlanIssue {
  kind: PlanIssueKind
  message: string
  day?: string
  entryId?: string
}

export type PlanInputErrorCode = 'invalid_day' | 'invalid_date' | 'invalid_time_zone' | 'invalid_payload'

/**
 * Raised only for input the planner cannot reason about at all. Every other
 * problem degrades into a {@link PlanIssue}.
 */
export class PlanInputError extends Error {
  readonly code: PlanInputErrorCode
  readonly details: string[]

  constructor(code: PlanInputErrorCode, message: string, details: string[] = []) {
    super(message)
    this.name = 'PlanInputError'
    this.code = code
    this.details = details
  }
}

export function issue(kind: PlanIssueKind, message: string, extra: Omit<PlanIssue, 'kind' | 'message'> = {}): PlanIssue {
  return { kind, message, ...extra }
}
