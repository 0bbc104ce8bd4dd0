import { buildNotConfiguredError } from './query-error.js'

import type { QueryError } from './query-error.js'
import type { QueryResult } from '../types/query.js'

export const SKIPPED_MODEL = 'N/A'

export const successResult = (params: {
  model: string
  response: string
  inputTokens: number
  outputTokens: number
  elapsedSeconds: number
  costUsd: number
}): QueryResult => ({
  ...(params.response ? { response: params.response } : {}),
  model: params.model,
  inputTokens: params.inputTokens,
  outputTokens: params.outputTokens,
  elapsedSeconds: params.elapsedSeconds,
  costUsd: params.costUsd,
})

export const failedResult = (params: {
  model: string
  error: QueryError
  elapsedSeconds: number
}): QueryResult => ({
  model: params.model,
  inputTokens: 0,
  outputTokens: 0,
  elapsedSeconds: params.elapsedSeconds,
  costUsd: 0,
  error: params.error.message,
  errorKind: params.error.kind,
})

export const skippedCloudResult = (): QueryResult =>
  failedResult({
    model: SKIPPED_MODEL,
    error: buildNotConfiguredError(),
    elapsedSeconds: 0,
  })

export const isFailed = (result: QueryResult): boolean =>
  result.error !== undefined && result.error.length > 0
