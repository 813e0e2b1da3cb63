export const SOURCE_ERROR_CODES = {
  HTTP_ERROR: 'HTTP_ERROR',
  PROXY_ERROR: 'PROXY_ERROR',
  NO_JSON_PAYLOAD: 'NO_JSON_PAYLOAD',
  ACCOUNT_NOT_FOUND: 'ACCOUNT_NOT_FOUND',
  INVALID_TIMELINE: 'INVALID_TIMELINE',
} as const

export type SourceErrorCode = typeof SOURCE_ERROR_CODES[keyof typeof SOURCE_ERROR_CODES]

export class SourceFetchError extends Error {
  constructor(
    message: string,
    public readonly code: SourceErrorCode,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'SourceFetchError'
    Object.setPrototypeOf(this, SourceFetchError.prototype)
  }
}
