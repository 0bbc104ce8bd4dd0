export type QueryErrorKind =
  | 'credential'
  | 'connection'
  | 'timeout'
  | 'backend'
  | 'not_configured'

export type QueryResult = Readonly<{
  response?: string
  model: string
  inputTokens: number
  outputTokens: number
  elapsedSeconds: number
  costUsd: number
  error?: string
  errorKind?: QueryErrorKind
}>

export type Backend = {
  label: string
  model: string
  query: (prompt: string) => Promise<QueryResult>
}

export type ExchangeResults = {
  cloud: QueryResult
  local: QueryResult
}
