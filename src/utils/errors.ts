import { Response } from 'express'
import { ZodError } from 'zod'

export type ErrorIssue = { path: string; message: string }

export abstract class AppError extends Error {
  abstract readonly status: number
  readonly code: string
  readonly issues?: ErrorIssue[]

  constructor(code: string, detail: string, issues?: ErrorIssue[]) {
    super(detail)
    this.name = new.target.name
    this.code = code
    this.issues = issues
  }
}

/** Malformed identifier, missing tenant (400) or schema violation (422). */
export class ValidationError extends AppError {
  readonly status: 400 | 422

  constructor(code: string, detail: string, status: 400 | 422 = 400, issues?: ErrorIssue[]) {
    super(code, detail, issues)
    this.status = status
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map(i => ({ path: i.path.join('.'), message: i.message }))
    return new ValidationError('invalid_payload', 'Payload failed schema validation', 422, issues)
  }
}

export class NotFoundError extends AppError {
  readonly status = 404

  constructor(detail = 'Document not found') {
    super('not_found', detail)
  }
}

/** Anything the store layer threw that we did not raise ourselves. */
export class StoreUnavailableError extends AppError {
  readonly status = 503

  constructor(detail: string) {
    super('store_unavailable', detail)
  }
}

export const MAX_STORE_DETAIL = 200

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err))

export const toStoreUnavailable = (err: unknown) =>
  new StoreUnavailableError(`Database unavailable: ${messageOf(err).slice(0, MAX_STORE_DETAIL)}`)

export const sendError = (res: Response, err: unknown) => {
  if (err instanceof AppError) {
    if (err instanceof StoreUnavailableError) console.error('store error:', err.message)
    const body: { error: string; detail: string; issues?: ErrorIssue[] } = { error: err.code, detail: err.message }
    if (err.issues) body.issues = err.issues
    return res.status(err.status).json(body)
  }
  console.error('Unhandled route error:', err)
  return res.status(500).json({ error: 'internal_error', detail: 'Unexpected server error' })
}
