import { Ollama } from 'ollama'
import { z } from 'zod'

import { elapsedSecondsSince, toCount } from '../shared/utils.js'

import { createTimeout } from './http-client.js'
import {
  buildBackendError,
  buildConnectionError,
  buildTimeoutError,
  isConnectionFailure,
} from './query-error.js'
import { failedResult, successResult } from './result.js'

import type { FetchLike } from './http-client.js'
import type { QueryError } from './query-error.js'
import type { LocalSettings } from '../config.js'
import type { Backend } from '../types/query.js'

const ollamaChatSchema = z.object({
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().nullish(),
  eval_count: z.number().nullish(),
})

const classifyLocalError = (
  error: unknown,
  ctx: { timedOut: boolean; timeoutMs: number },
): QueryError => {
  if (ctx.timedOut) return buildTimeoutError(ctx.timeoutMs, error)
  if (isConnectionFailure(error)) {
    return buildConnectionError(
      'connection failure, is the server running?',
      error,
    )
  }
  return buildBackendError(error)
}

export type LocalClientDeps = {
  fetch?: FetchLike
  now?: () => number
}

export const createLocalClient = (
  settings: LocalSettings,
  deps: LocalClientDeps = {},
): Backend => {
  const fetchImpl = deps.fetch ?? globalThis.fetch
  const now = deps.now ?? Date.now

  const query = async (prompt: string) => {
    const timeout = createTimeout(settings.timeoutMs)
    const { signal } = timeout
    const boundFetch: FetchLike = (input, init) =>
      fetchImpl(input, signal ? { ...init, signal } : init)
    const client = new Ollama({ host: settings.baseUrl, fetch: boundFetch })
    const startedAt = now()
    try {
      const reply = await client.chat({
        model: settings.model,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
      })
      const elapsedSeconds = elapsedSecondsSince(startedAt, now)
      const parsed = ollamaChatSchema.safeParse(reply)
      if (!parsed.success) {
        throw new Error(
          `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        )
      }
      return successResult({
        model: settings.model,
        response: parsed.data.message.content.trim(),
        inputTokens: toCount(parsed.data.prompt_eval_count),
        outputTokens: toCount(parsed.data.eval_count),
        elapsedSeconds,
        costUsd: 0,
      })
    } catch (error) {
      return failedResult({
        model: settings.model,
        error: classifyLocalError(error, {
          timedOut: timeout.timedOut(),
          timeoutMs: settings.timeoutMs,
        }),
        elapsedSeconds: elapsedSecondsSince(startedAt, now),
      })
    } finally {
      timeout.dispose()
    }
  }

  return {
    label: settings.label,
    model: settings.model,
    query,
  }
}
