import {
  defaultOutcomeMessages,
  outcomeHttpStatus,
  type ClassifiedOutcome,
  type OperationResult,
  type OutcomeKind
} from '@share-gateway/outcomes'

// Failures of these kinds can carry transport or runtime text; clients get the fixed message.
const OPAQUE_OUTCOME_KINDS: ReadonlySet<OutcomeKind> = new Set(['upstream_unavailable', 'auth_acquisition_failed'])

export const INTERNAL_ERROR_MESSAGE = 'Unexpected internal error'

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 415 | 422 | 500 | 502 | 503

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus
  public readonly reason?: string

  public constructor({
    code,
    message,
    status,
    reason
  }: {
    code: string
    message: string
    status: ErrorStatus
    reason?: string
  }) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    if (reason) {
      this.reason = reason
    }
  }
}

export const badRequest = (code: string, message: string) =>
  new AppError({code, message, status: 400})

export const notFound = (code: string, message: string) =>
  new AppError({code, message, status: 404})

export const unsupportedMediaType = (code: string, message: string) =>
  new AppError({code, message, status: 415})

export const internal = (code: string, message: string) =>
  new AppError({code, message, status: 500})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

export const fromOutcome = (outcome: ClassifiedOutcome) =>
  new AppError({
    code: outcome.kind,
    message: OPAQUE_OUTCOME_KINDS.has(outcome.kind) ? defaultOutcomeMessages[outcome.kind] : outcome.message,
    status: outcomeHttpStatus[outcome.kind],
    ...(outcome.reason ? {reason: outcome.reason} : {})
  })

export const unwrapResult = <T>(result: OperationResult<T>): T => {
  if (!result.ok) {
    throw fromOutcome(result.outcome)
  }

  return result.value
}
