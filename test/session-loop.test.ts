import { afterEach, expect, test, vi } from 'vitest'

import { buildCredentialError } from '../src/llm/query-error.js'
import { failedResult, successResult } from '../src/llm/result.js'
import { isQuitCommand, runSession } from '../src/session/loop.js'

import type { SessionDeps } from '../src/session/loop.js'
import type { Backend, ExchangeResults, QueryResult } from '../src/types/query.js'

const localResult = successResult({
  model: 'llama3',
  response: 'local reply',
  inputTokens: 4,
  outputTokens: 2,
  elapsedSeconds: 0.3,
  costUsd: 0,
})

const fakeBackend = (label: string, result: QueryResult) => {
  const query = vi.fn(async (_prompt: string) => result)
  const backend: Backend = { label, model: result.model, query }
  return { backend, query }
}

const scriptedInput = (inputs: Array<string | null>) => {
  const queue = [...inputs]
  return async (): Promise<string | null> => queue.shift() ?? null
}

const buildDeps = (
  inputs: Array<string | null>,
  overrides: Partial<SessionDeps> = {},
) => {
  const output: string[] = []
  const local = fakeBackend('Ollama', localResult)
  const recorded: Array<{ prompt: string; results: ExchangeResults }> = []
  const deps: SessionDeps = {
    readPrompt: scriptedInput(inputs),
    write: (text) => {
      output.push(text)
    },
    local: local.backend,
    report: { width: 20, cloudLabel: 'OpenAI', localLabel: 'Ollama' },
    recordExchange: async (prompt, results) => {
      recorded.push({ prompt, results })
    },
    ...overrides,
  }
  return { deps, output, local, recorded }
}

afterEach(() => {
  vi.restoreAllMocks()
})

test('isQuitCommand accepts quit and exit in any case', () => {
  expect(isQuitCommand('QUIT')).toBe(true)
  expect(isQuitCommand('  Exit ')).toBe(true)
  expect(isQuitCommand('quitting')).toBe(false)
})

test('runSession stops on quit without calling backends or the recorder', async () => {
  const cloud = fakeBackend('OpenAI', localResult)
  const recordExchange = vi.fn(async () => undefined)
  const { deps, output, local } = buildDeps(['QuIt'], {
    cloud: cloud.backend,
    recordExchange,
  })

  const outcome = await runSession(deps)

  expect(outcome).toEqual({ exchanges: 0, reason: 'quit' })
  expect(local.query).not.toHaveBeenCalled()
  expect(cloud.query).not.toHaveBeenCalled()
  expect(recordExchange).not.toHaveBeenCalled()
  expect(output.join('')).toBe('Goodbye!\n')
})

test('runSession ignores blank input', async () => {
  const { deps, local, recorded } = buildDeps(['   ', '', 'exit'])

  const outcome = await runSession(deps)

  expect(outcome).toEqual({ exchanges: 0, reason: 'quit' })
  expect(local.query).not.toHaveBeenCalled()
  expect(recorded).toHaveLength(0)
})

test('runSession skips the cloud backend when no credential is configured', async () => {
  const { deps, output, local, recorded } = buildDeps(['  hello  ', null])

  const outcome = await runSession(deps)

  expect(outcome).toEqual({ exchanges: 1, reason: 'end_of_input' })
  expect(local.query).toHaveBeenCalledWith('hello')
  expect(recorded).toHaveLength(1)
  expect(recorded[0]?.prompt).toBe('hello')
  expect(recorded[0]?.results.cloud).toEqual({
    model: 'N/A',
    inputTokens: 0,
    outputTokens: 0,
    elapsedSeconds: 0,
    costUsd: 0,
    error: 'no credential configured',
    errorKind: 'not_configured',
  })
  expect(recorded[0]?.results.local).toEqual(localResult)
  const text = output.join('')
  expect(text).toContain('[Querying Ollama...] done.\n')
  expect(text).not.toContain('[Querying OpenAI...]')
  expect(text.endsWith('\nGoodbye!\n')).toBe(true)
})

test('runSession reports a failing backend and still records the exchange', async () => {
  const cloud = fakeBackend(
    'OpenAI',
    failedResult({
      model: 'gpt-4o-mini',
      error: buildCredentialError(),
      elapsedSeconds: 0.2,
    }),
  )
  const { deps, output, recorded } = buildDeps(['hi', null], {
    cloud: cloud.backend,
  })

  await runSession(deps)

  expect(cloud.query).toHaveBeenCalledWith('hi')
  expect(output.join('')).toContain('[Querying OpenAI...] error: invalid credential\n')
  expect(recorded[0]?.results.cloud.errorKind).toBe('credential')
})

test('runSession keeps going when the log write fails', async () => {
  const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
  const { deps, output, local } = buildDeps(['first', 'second', null], {
    recordExchange: async () => {
      throw new Error('disk full')
    },
  })

  const outcome = await runSession(deps)

  expect(outcome).toEqual({ exchanges: 2, reason: 'end_of_input' })
  expect(local.query).toHaveBeenCalledTimes(2)
  const warnings = output.filter(
    (text) => text === '[WARN] failed to write log: disk full\n',
  )
  expect(warnings).toHaveLength(2)
  expect(consoleError).toHaveBeenCalledWith(
    '[safe] session:record_exchange',
    expect.objectContaining({ error: 'disk full' }),
  )
})
