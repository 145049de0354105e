import { ZodError } from 'zod'

export type ErrorCode =
  | 'NotFound'
  | 'ValidationError'
  | 'ConflictError'
  | 'StoreError'

export type CodedError = Error & { code: ErrorCode; meta?: Record<string, unknown> }

const ERROR_CODES: ReadonlySet<string> = new Set<ErrorCode>(['NotFound', 'ValidationError', 'ConflictError', 'StoreError'])

export function makeError(code: ErrorCode, message: string, meta?: Record<string, unknown>): CodedError {
  const err: CodedError = Object.assign(new Error(message), { code })
  if (meta) err.meta = meta
  return err
}

export function isCodedError(error: unknown): error is CodedError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && ERROR_CODES.has(error.code)
}

// DuckDB reports failures as "<Kind> Error: <detail>"
const STORE_ERROR_PREFIXES: Array<[RegExp, ErrorCode]> = [
  [/^Catalog Error:.*already exists/, 'ConflictError'],
  [/^Catalog Error:/, 'NotFound'],
  [/^(Parser|Binder|Conversion|Invalid Input|Syntax) Error:/, 'ValidationError'],
  [/^Constraint Error:/, 'ConflictError'],
]

export function toCodedStoreError(error: unknown, op: string): CodedError {
  if (isCodedError(error)) return error
  if (error instanceof ZodError) return fromZodError(error)

  const message = error instanceof Error ? error.message : String(error)
  for (const [pattern, code] of STORE_ERROR_PREFIXES) {
    if (pattern.test(message)) return makeError(code, message, { op })
  }
  return makeError('StoreError', message, { op })
}

export function fromZodError(error: ZodError): CodedError {
  const issues = error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
  return makeError('ValidationError', `Invalid arguments: ${issues.join('; ')}`, { issues: error.issues })
}

export const HTTP_STATUS: Record<ErrorCode, number> = {
  NotFound: 404,
  ValidationError: 400,
  ConflictError: 409,
  StoreError: 500,
}
