import { readFile } from 'node:fs/promises'
import { isAbsolute, join } from 'node:path'

import { z } from 'zod'

import { isMissingFileError } from './shared/error-code.js'

import type { Pricing } from './llm/pricing.js'

export type CloudSettings = {
  label: string
  model: string
  baseUrl: string
  apiKey?: string
  /** 0 disables the client-side timeout. */
  timeoutMs: number
  pricing: Pricing
}

export type LocalSettings = {
  label: string
  model: string
  baseUrl: string
  timeoutMs: number
}

export type PlaygroundConfig = {
  workDir: string
  cloud: CloudSettings
  local: LocalSettings
  display: { width: number }
  paths: { logFile: string; diagnosticsLog: string }
}

export const DEFAULT_CONFIG_FILE = 'playground.config.json'

/** Narrowest column that still fits a footer cell such as `Cost: 0.000450 USD`. */
export const MIN_WIDTH = 20
export const MAX_WIDTH = 200

export const isValidWidth = (value: number): boolean =>
  Number.isInteger(value) && value >= MIN_WIDTH && value <= MAX_WIDTH

export const defaultConfig = (params: { workDir: string }): PlaygroundConfig => ({
  workDir: params.workDir,
  cloud: {
    label: 'OpenAI',
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com',
    timeoutMs: 60_000,
    pricing: { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  },
  local: {
    label: 'Ollama',
    model: 'llama3',
    baseUrl: 'http://localhost:11434',
    timeoutMs: 120_000,
  },
  display: { width: 40 },
  paths: {
    logFile: join(params.workDir, 'logs', 'responses.jsonl'),
    diagnosticsLog: join(params.workDir, 'logs', 'playground.log'),
  },
})

const nonEmpty = z.string().trim().min(1)
const timeoutMs = z.number().int().nonnegative()

const configFileSchema = z
  .object({
    cloud: z
      .object({
        label: nonEmpty,
        model: nonEmpty,
        baseUrl: z.string().url(),
        timeoutMs,
        pricing: z
          .object({
            inputPerMillion: z.number().nonnegative(),
            outputPerMillion: z.number().nonnegative(),
          })
          .strict()
          .partial(),
      })
      .strict()
      .partial(),
    local: z
      .object({
        label: nonEmpty,
        model: nonEmpty,
        baseUrl: z.string().url(),
        timeoutMs,
      })
      .strict()
      .partial(),
    display: z
      .object({ width: z.number().int().min(MIN_WIDTH).max(MAX_WIDTH) })
      .strict()
      .partial(),
    paths: z
      .object({ logFile: nonEmpty, diagnosticsLog: nonEmpty })
      .strict()
      .partial(),
  })
  .strict()
  .partial()

export type ConfigFile = z.infer<typeof configFileSchema>

const formatIssue = (error: z.ZodError): string => {
  const issue = error.issues[0]
  if (!issue) return 'invalid config'
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

export const parseConfigFile = (raw: string, source: string): ConfigFile => {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`[config] ${source} is not valid JSON: ${reason}`)
  }
  const parsed = configFileSchema.safeParse(json)
  if (!parsed.success)
    throw new Error(`[config] ${source} ${formatIssue(parsed.error)}`)
  return parsed.data
}

export const resolveWorkPath = (root: string, value: string): string =>
  isAbsolute(value) ? value : join(root, value)

export const applyConfigFile = (
  config: PlaygroundConfig,
  file: ConfigFile,
): PlaygroundConfig => ({
  workDir: config.workDir,
  cloud: {
    ...config.cloud,
    ...file.cloud,
    pricing: { ...config.cloud.pricing, ...file.cloud?.pricing },
  },
  local: { ...config.local, ...file.local },
  display: { ...config.display, ...file.display },
  paths: {
    logFile: file.paths?.logFile
      ? resolveWorkPath(config.workDir, file.paths.logFile)
      : config.paths.logFile,
    diagnosticsLog: file.paths?.diagnosticsLog
      ? resolveWorkPath(config.workDir, file.paths.diagnosticsLog)
      : config.paths.diagnosticsLog,
  },
})

/**
 * Reads the optional JSON config file. A missing file is only an error when
 * the path was given explicitly.
 */
export const loadConfig = async (options: {
  workDir: string
  configPath?: string
}): Promise<PlaygroundConfig> => {
  const base = defaultConfig({ workDir: options.workDir })
  const explicit = options.configPath !== undefined
  const path = resolveWorkPath(
    options.workDir,
    options.configPath ?? DEFAULT_CONFIG_FILE,
  )
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (!explicit && isMissingFileError(error)) return base
    throw error
  }
  return applyConfigFile(base, parseConfigFile(raw, path))
}
