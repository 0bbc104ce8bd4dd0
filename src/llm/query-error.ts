import { readErrorCode } from '../shared/error-code.js'

import { describeError } from './error-format.js'
import { HttpError } from './http-client.js'

import type { QueryErrorKind } from '../types/query.js'

export class QueryError extends Error {
  readonly kind: QueryErrorKind

  constructor(params: { kind: QueryErrorKind; message: string; cause?: unknown }) {
    super(params.message, { cause: params.cause })
    this.name = 'QueryError'
    this.kind = params.kind
  }
}

export const buildCredentialError = (cause?: unknown): QueryError =>
  new QueryError({ kind: 'credential', message: 'invalid credential', cause })

export const buildConnectionError = (
  message: string,
  cause?: unknown,
): QueryError => new QueryError({ kind: 'connection', message, cause })

export const buildTimeoutError = (
  timeoutMs: number,
  cause?: unknown,
): QueryError =>
  new QueryError({
    kind: 'timeout',
    message: `timed out after ${formatTimeoutSeconds(timeoutMs)}s`,
    cause,
  })

export const buildBackendError = (cause: unknown): QueryError =>
  new QueryError({
    kind: 'backend',
    message: `error: ${describeError(cause)}`,
    cause,
  })

export const buildNotConfiguredError = (): QueryError =>
  new QueryError({
    kind: 'not_configured',
    message: 'no credential configured',
  })

const formatTimeoutSeconds = (timeoutMs: number): string => {
  const seconds = timeoutMs / 1000
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1)
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
])

const CONNECTION_MESSAGE_PATTERNS = [/fetch failed/i, /socket hang up/i]

const readCause = (error: unknown): unknown =>
  error instanceof Error ? error.cause : undefined

/**
 * True when the request never produced an HTTP response. Walks the cause
 * chain because undici reports `TypeError: fetch failed` with the socket
 * error attached as `cause`.
 */
export const isConnectionFailure = (error: unknown): boolean => {
  if (error instanceof HttpError) return false
  let current: unknown = error
  for (let depth = 0; depth < 4 && current !== undefined; depth += 1) {
    const node = current
    const code = readErrorCode(node)
    if (code && CONNECTION_ERROR_CODES.has(code)) return true
    if (
      node instanceof Error &&
      CONNECTION_MESSAGE_PATTERNS.some((pattern) => pattern.test(node.message))
    )
      return true
    current = readCause(node)
  }
  return false
}
