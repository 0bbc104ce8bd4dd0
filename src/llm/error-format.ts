import { readErrorCode } from '../shared/error-code.js'

const readMessage = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined
  const normalized = value.trim()
  return normalized ? normalized : undefined
}

type ErrorNode = { message?: string; code?: string; cause?: unknown }

const parseErrorNode = (value: unknown): ErrorNode => {
  if (value instanceof Error) {
    const code = readErrorCode(value)
    const message = readMessage(value.message)
    return {
      ...(message ? { message } : {}),
      ...(code ? { code } : {}),
      ...(value.cause !== undefined ? { cause: value.cause } : {}),
    }
  }
  if (!value || typeof value !== 'object') return {}
  const message =
    'message' in value ? readMessage(value.message) : undefined
  const code = readErrorCode(value)
  return {
    ...(message ? { message } : {}),
    ...(code ? { code } : {}),
    ...('cause' in value && value.cause !== undefined
      ? { cause: value.cause }
      : {}),
  }
}

export const formatCause = (value: unknown): string | undefined => {
  const details: string[] = []
  let current: unknown = value
  const seen = new Set<unknown>()
  for (let depth = 0; depth < 4 && current !== undefined; depth += 1) {
    if (typeof current === 'object' && current !== null) {
      if (seen.has(current)) break
      seen.add(current)
    }
    const parsed = parseErrorNode(current)
    const part = [parsed.message ?? '', parsed.code ? `code=${parsed.code}` : '']
      .filter(Boolean)
      .join(', ')
    if (part && depth > 0) details.push(part)
    if (parsed.cause === undefined || parsed.cause === current) break
    current = parsed.cause
  }
  return details.length > 0 ? details.join(' -> ') : undefined
}

export const describeError = (err: unknown): string => {
  if (err instanceof Error) {
    const cause = formatCause(err)
    const message = err.message || err.name
    return cause ? `${message} (cause: ${cause})` : message
  }
  return String(err)
}
