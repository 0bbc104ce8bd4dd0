import { appendFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { z } from 'zod'

import { ensureDir } from '../fs/ensure.js'
import { nowIso } from '../time.js'

import type { QueryResult } from '../types/query.js'

const loggedResultSchema = z.object({
  response: z.string().nullable(),
  model: z.string(),
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  elapsedSeconds: z.number().nonnegative(),
  costUsd: z.number().nonnegative(),
  error: z.string().nullable(),
  errorKind: z
    .enum(['credential', 'connection', 'timeout', 'backend', 'not_configured'])
    .nullable(),
})

export const logEntrySchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  prompt: z.string(),
  cloud: loggedResultSchema,
  local: loggedResultSchema,
})

export type LogEntry = z.infer<typeof logEntrySchema>
export type LoggedResult = z.infer<typeof loggedResultSchema>

export const toLoggedResult = (result: QueryResult): LoggedResult => ({
  response: result.response ?? null,
  model: result.model,
  inputTokens: result.inputTokens,
  outputTokens: result.outputTokens,
  elapsedSeconds: result.elapsedSeconds,
  costUsd: result.costUsd,
  error: result.error ?? null,
  errorKind: result.errorKind ?? null,
})

export const buildLogEntry = (params: {
  prompt: string
  cloud: QueryResult
  local: QueryResult
  timestamp?: string
}): LogEntry => ({
  timestamp: params.timestamp ?? nowIso(),
  prompt: params.prompt,
  cloud: toLoggedResult(params.cloud),
  local: toLoggedResult(params.local),
})

/**
 * Appends one JSON line. The file is opened and closed per call and the
 * line goes out in a single write, so concurrent writers never interleave
 * within a record.
 */
export const appendInteraction = async (
  path: string,
  params: {
    prompt: string
    cloud: QueryResult
    local: QueryResult
    timestamp?: string
  },
): Promise<LogEntry> => {
  const entry = buildLogEntry(params)
  await ensureDir(dirname(path))
  await appendFile(path, `${JSON.stringify(entry)}\n`, 'utf8')
  return entry
}
