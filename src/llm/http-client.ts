export class HttpError extends Error {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string) {
    super(body ? `HTTP ${status}: ${body}` : `HTTP ${status}`)
    this.name = 'HttpError'
    this.status = status
    this.body = body
  }
}

export type FetchLike = typeof fetch

export const normalizeBaseUrl = (value: string): string => {
  const trimmed = value.replace(/\/+$/, '')
  if (trimmed.endsWith('/v1')) return trimmed
  return `${trimmed}/v1`
}

const snippet = (body: string, limit: number): string =>
  body.length > limit ? `${body.slice(0, limit)}...` : body

export const requestJson = async (params: {
  url: string
  payload: unknown
  headers: Record<string, string>
  fetchImpl: FetchLike
  signal?: AbortSignal
}): Promise<unknown> => {
  const response = await params.fetchImpl(params.url, {
    method: 'POST',
    headers: params.headers,
    body: JSON.stringify(params.payload),
    ...(params.signal ? { signal: params.signal } : {}),
  })
  const body = await response.text()
  if (!response.ok) throw new HttpError(response.status, snippet(body, 500))
  if (!body) return {}
  try {
    const parsed: unknown = JSON.parse(body)
    return parsed
  } catch {
    throw new HttpError(response.status, `invalid_json ${snippet(body, 200)}`)
  }
}

export type TimeoutHandle = {
  signal: AbortSignal | undefined
  timedOut: () => boolean
  dispose: () => void
}

export const createTimeout = (timeoutMs: number): TimeoutHandle => {
  if (timeoutMs <= 0)
    return { signal: undefined, timedOut: () => false, dispose: () => undefined }
  const controller = new AbortController()
  let fired = false
  const timer = setTimeout(() => {
    fired = true
    controller.abort()
  }, timeoutMs)
  return {
    signal: controller.signal,
    timedOut: () => fired,
    dispose: () => clearTimeout(timer),
  }
}
