import { expect, test, vi } from 'vitest'

import { defaultConfig } from '../src/config.js'
import { createLocalClient } from '../src/llm/local-client.js'

import type { FetchLike } from '../src/llm/http-client.js'

const settings = (timeoutMs?: number) => {
  const { local } = defaultConfig({ workDir: '/tmp/playground' })
  return { ...local, ...(timeoutMs !== undefined ? { timeoutMs } : {}) }
}

const chatReply = (body: Record<string, unknown>): Response =>
  new Response(`${JSON.stringify(body)}\n`, {
    status: 200,
    headers: { 'Content-Type': 'application/x-ndjson' },
  })

test('local client returns the trimmed reply and token counts', async () => {
  const fetchMock = vi.fn<FetchLike>(async () =>
    chatReply({
      model: 'llama3',
      created_at: '2024-05-01T10:00:00Z',
      message: { role: 'assistant', content: ' Local answer \n' },
      done: true,
      prompt_eval_count: 7,
      eval_count: 3,
    }),
  )
  let tick = 0
  const client = createLocalClient(settings(), {
    fetch: fetchMock,
    now: () => {
      tick += 250
      return tick
    },
  })

  const result = await client.query('Say hello')

  expect(result).toEqual({
    response: 'Local answer',
    model: 'llama3',
    inputTokens: 7,
    outputTokens: 3,
    elapsedSeconds: 0.25,
    costUsd: 0,
  })
  const [url] = fetchMock.mock.calls[0] ?? []
  expect(String(url)).toBe('http://localhost:11434/api/chat')
})

test('local client defaults missing counts to zero', async () => {
  const client = createLocalClient(settings(), {
    fetch: async () =>
      chatReply({
        model: 'llama3',
        message: { role: 'assistant', content: 'ok' },
        done: true,
      }),
  })

  const result = await client.query('ping')

  expect(result.response).toBe('ok')
  expect(result.inputTokens).toBe(0)
  expect(result.outputTokens).toBe(0)
})

test('local client hints at the server when it cannot connect', async () => {
  const client = createLocalClient(settings(), {
    fetch: async () => {
      throw new TypeError('fetch failed', {
        cause: { code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' },
      })
    },
  })

  const result = await client.query('ping')

  expect(result.error).toBe('connection failure, is the server running?')
  expect(result.errorKind).toBe('connection')
  expect(result.costUsd).toBe(0)
})

test('local client reports server errors with their message', async () => {
  const client = createLocalClient(settings(), {
    fetch: async () => new Response('model not found', { status: 404 }),
  })

  const result = await client.query('ping')

  expect(result.error).toBe('error: model not found')
  expect(result.errorKind).toBe('backend')
})

test('local client gives up after the configured timeout', async () => {
  const client = createLocalClient(settings(200), {
    fetch: (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(
            Object.assign(new Error('This operation was aborted'), {
              name: 'AbortError',
            }),
          )
        })
      }),
  })

  const result = await client.query('ping')

  expect(result.error).toBe('timed out after 0.2s')
  expect(result.errorKind).toBe('timeout')
})
