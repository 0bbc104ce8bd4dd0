import { z } from 'zod'

import { elapsedSecondsSince, toCount } from '../shared/utils.js'

import {
  createTimeout,
  HttpError,
  normalizeBaseUrl,
  requestJson,
} from './http-client.js'
import { estimateCostUsd } from './pricing.js'
import {
  buildBackendError,
  buildConnectionError,
  buildCredentialError,
  buildTimeoutError,
  isConnectionFailure,
} from './query-error.js'
import { failedResult, successResult } from './result.js'

import type { FetchLike } from './http-client.js'
import type { QueryError } from './query-error.js'
import type { CloudSettings } from '../config.js'
import type { Backend } from '../types/query.js'

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullish() })
          .nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().nullish(),
      completion_tokens: z.number().nullish(),
    })
    .nullish(),
})

const extractChatText = (
  choices: z.infer<typeof chatCompletionSchema>['choices'],
): string =>
  choices
    .map((choice) => choice.message?.content ?? '')
    .filter((content) => content.length > 0)
    .join('\n')
    .trim()

const classifyCloudError = (
  error: unknown,
  ctx: { timedOut: boolean; timeoutMs: number },
): QueryError => {
  if (ctx.timedOut) return buildTimeoutError(ctx.timeoutMs, error)
  if (error instanceof HttpError && error.status === 401)
    return buildCredentialError(error)
  if (isConnectionFailure(error))
    return buildConnectionError('connection failure', error)
  return buildBackendError(error)
}

export type CloudClientDeps = {
  fetch?: FetchLike
  now?: () => number
}

export const createCloudClient = (
  settings: CloudSettings & { apiKey: string },
  deps: CloudClientDeps = {},
): Backend => {
  const fetchImpl = deps.fetch ?? globalThis.fetch
  const now = deps.now ?? Date.now
  const url = `${normalizeBaseUrl(settings.baseUrl)}/chat/completions`

  const query = async (prompt: string) => {
    const timeout = createTimeout(settings.timeoutMs)
    const startedAt = now()
    try {
      const raw = await requestJson({
        url,
        payload: {
          model: settings.model,
          messages: [{ role: 'user', content: prompt }],
        },
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${settings.apiKey}`,
        },
        fetchImpl,
        ...(timeout.signal ? { signal: timeout.signal } : {}),
      })
      const elapsedSeconds = elapsedSecondsSince(startedAt, now)
      const parsed = chatCompletionSchema.safeParse(raw)
      if (!parsed.success) {
        throw new Error(
          `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        )
      }
      const inputTokens = toCount(parsed.data.usage?.prompt_tokens)
      const outputTokens = toCount(parsed.data.usage?.completion_tokens)
      return successResult({
        model: settings.model,
        response: extractChatText(parsed.data.choices),
        inputTokens,
        outputTokens,
        elapsedSeconds,
        costUsd: estimateCostUsd(settings.pricing, {
          inputTokens,
          outputTokens,
        }),
      })
    } catch (error) {
      return failedResult({
        model: settings.model,
        error: classifyCloudError(error, {
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
