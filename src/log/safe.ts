import { appendLog } from './append.js'

type SafeErrorInfo = {
  message: string
  name?: string
  stack?: string
}

export type SafeLogOptions = {
  logPath?: string
  meta?: Record<string, unknown>
}

let defaultLogPath: string | null = null

export const setDefaultLogPath = (path?: string | null): void => {
  if (typeof path !== 'string') {
    defaultLogPath = null
    return
  }
  const trimmed = path.trim()
  defaultLogPath = trimmed.length > 0 ? trimmed : null
}

const trimStack = (stack?: string, lines = 6): string | undefined => {
  if (!stack) return undefined
  return stack.split(/\r?\n/).slice(0, lines).join('\n')
}

const normalizeError = (error: unknown): SafeErrorInfo => {
  if (error instanceof Error) {
    const info: SafeErrorInfo = {
      message: error.message,
      name: error.name,
    }
    const stack = trimStack(error.stack)
    if (stack) info.stack = stack
    return info
  }
  return { message: String(error) }
}

export const logSafeError = async (
  context: string,
  error: unknown,
  options?: SafeLogOptions,
): Promise<void> => {
  const info = normalizeError(error)
  const payload = {
    event: 'error',
    context,
    error: info.message,
    ...(info.name ? { errorName: info.name } : {}),
    ...(info.stack ? { errorStack: info.stack } : {}),
    ...(options?.meta ? { meta: options.meta } : {}),
  }
  const logPath = options?.logPath ?? defaultLogPath
  if (logPath) {
    try {
      await appendLog(logPath, payload)
      return
    } catch (appendError) {
      console.error(`[safe] failed to append log for ${context}`, appendError)
    }
  }
  console.error(`[safe] ${context}`, payload)
}

export const bestEffort = async (
  context: string,
  fn: () => unknown,
  options: SafeLogOptions = {},
): Promise<void> => {
  try {
    await fn()
  } catch (error) {
    await logSafeError(context, error, options)
  }
}
