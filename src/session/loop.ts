import { isFailed, skippedCloudResult } from '../llm/result.js'
import { logSafeError } from '../log/safe.js'
import { formatReport } from '../report/format.js'

import type { ReportOptions } from '../report/format.js'
import type { Backend, ExchangeResults, QueryResult } from '../types/query.js'

export type SessionDeps = {
  /** Resolves `null` on end of input or interrupt. */
  readPrompt: () => Promise<string | null>
  write: (text: string) => void
  local: Backend
  /** Absent when no credential is configured; the cloud call is skipped. */
  cloud?: Backend
  report: ReportOptions
  recordExchange: (prompt: string, results: ExchangeResults) => Promise<void>
}

export type SessionOutcome = {
  exchanges: number
  reason: 'quit' | 'end_of_input'
}

const QUIT_COMMANDS = new Set(['quit', 'exit'])

export const isQuitCommand = (input: string): boolean =>
  QUIT_COMMANDS.has(input.trim().toLowerCase())

const queryWithProgress = async (
  backend: Backend,
  prompt: string,
  write: (text: string) => void,
): Promise<QueryResult> => {
  write(`[Querying ${backend.label}...] `)
  const result = await backend.query(prompt)
  write(isFailed(result) ? `error: ${result.error ?? ''}\n` : 'done.\n')
  return result
}

const recordSafely = async (
  deps: SessionDeps,
  prompt: string,
  results: ExchangeResults,
): Promise<void> => {
  try {
    await deps.recordExchange(prompt, results)
  } catch (error) {
    await logSafeError('session:record_exchange', error, {
      meta: { promptChars: prompt.length },
    })
    const message = error instanceof Error ? error.message : String(error)
    deps.write(`[WARN] failed to write log: ${message}\n`)
  }
}

export const runExchange = async (
  deps: SessionDeps,
  prompt: string,
): Promise<ExchangeResults> => {
  deps.write('\n')
  const local = await queryWithProgress(deps.local, prompt, deps.write)
  const cloud = deps.cloud
    ? await queryWithProgress(deps.cloud, prompt, deps.write)
    : skippedCloudResult()
  const lines = formatReport(prompt, cloud, local, deps.report)
  deps.write(`\n${lines.join('\n')}\n\n`)
  const results = { cloud, local }
  await recordSafely(deps, prompt, results)
  return results
}

export const runSession = async (deps: SessionDeps): Promise<SessionOutcome> => {
  let exchanges = 0
  for (;;) {
    const line = await deps.readPrompt()
    if (line === null) {
      deps.write('\nGoodbye!\n')
      return { exchanges, reason: 'end_of_input' }
    }
    const prompt = line.trim()
    if (!prompt) continue
    if (isQuitCommand(prompt)) {
      deps.write('Goodbye!\n')
      return { exchanges, reason: 'quit' }
    }
    await runExchange(deps, prompt)
    exchanges += 1
  }
}
