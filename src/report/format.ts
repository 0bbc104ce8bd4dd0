import { wrapText } from './wrap.js'

import type { QueryResult } from '../types/query.js'

export type ReportOptions = {
  width: number
  cloudLabel: string
  localLabel: string
}

export const COLUMN_SEPARATOR = ' | '
export const NO_RESPONSE = '(no response)'
const NOT_AVAILABLE = 'N/A'
const ELLIPSIS = '…'

type StatKey = 'elapsedSeconds' | 'inputTokens' | 'outputTokens' | 'costUsd'

const STATS: ReadonlyArray<{ label: string; key: StatKey }> = [
  { label: 'Time', key: 'elapsedSeconds' },
  { label: 'In tokens', key: 'inputTokens' },
  { label: 'Out tokens', key: 'outputTokens' },
  { label: 'Cost', key: 'costUsd' },
]

export const fitCell = (text: string, width: number): string => {
  const chars = Array.from(text)
  if (chars.length <= width) return `${text}${' '.repeat(width - chars.length)}`
  return `${chars.slice(0, Math.max(0, width - 1)).join('')}${ELLIPSIS}`
}

const row = (left: string, right: string, width: number): string =>
  `${fitCell(left, width)}${COLUMN_SEPARATOR}${fitCell(right, width)}`

export const bodyLines = (result: QueryResult, width: number): string[] => {
  if (result.error) return wrapText(`[ERROR] ${result.error}`, width)
  if (result.response) return wrapText(result.response, width)
  return [NO_RESPONSE]
}

export const formatStat = (result: QueryResult, key: StatKey): string => {
  if (result.error && key !== 'elapsedSeconds') return NOT_AVAILABLE
  switch (key) {
    case 'elapsedSeconds':
      return `${result.elapsedSeconds.toFixed(3)} s`
    case 'costUsd':
      return `${result.costUsd.toFixed(6)} USD`
    case 'inputTokens':
    case 'outputTokens':
      return String(result[key])
  }
}

/**
 * Renders the side-by-side comparison. Every body, header and footer row is
 * exactly `2 * width + 3` characters.
 */
export const formatReport = (
  prompt: string,
  cloud: QueryResult,
  local: QueryResult,
  options: ReportOptions,
): string[] => {
  const { width } = options
  const fullWidth = width * 2 + COLUMN_SEPARATOR.length
  const doubleRule = '='.repeat(fullWidth)
  const columnRule = `${'-'.repeat(width)}${COLUMN_SEPARATOR}${'-'.repeat(width)}`

  const left = bodyLines(cloud, width)
  const right = bodyLines(local, width)
  const height = Math.max(left.length, right.length)
  const body: string[] = []
  for (let i = 0; i < height; i += 1)
    body.push(row(left[i] ?? '', right[i] ?? '', width))

  const footer = STATS.map(({ label, key }) =>
    row(
      `${label}: ${formatStat(cloud, key)}`,
      `${label}: ${formatStat(local, key)}`,
      width,
    ),
  )

  return [
    doubleRule,
    `PROMPT: ${prompt}`,
    doubleRule,
    row(
      `${options.cloudLabel} (${cloud.model})`,
      `${options.localLabel} (${local.model})`,
      width,
    ),
    columnRule,
    ...body,
    columnRule,
    ...footer,
    doubleRule,
  ]
}
