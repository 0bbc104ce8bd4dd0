import { isValidWidth, resolveWorkPath } from '../config.js'

import type { PlaygroundConfig } from '../config.js'

type Env = Record<string, string | undefined>

const readEnvString = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim()
  return value ? value : undefined
}

const parseEnvNonNegativeInteger = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed >= 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseEnvWidth = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (isValidWidth(parsed)) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const applyCloudEnv = (config: PlaygroundConfig, env: Env): void => {
  const apiKey = readEnvString(env, 'OPENAI_API_KEY')
  if (apiKey) config.cloud.apiKey = apiKey
  const model = readEnvString(env, 'OPENAI_MODEL')
  if (model) config.cloud.model = model
  const baseUrl = readEnvString(env, 'OPENAI_BASE_URL')
  if (baseUrl) config.cloud.baseUrl = baseUrl
  const timeoutMs = parseEnvNonNegativeInteger(
    'PLAYGROUND_CLOUD_TIMEOUT_MS',
    readEnvString(env, 'PLAYGROUND_CLOUD_TIMEOUT_MS'),
  )
  if (timeoutMs !== undefined) config.cloud.timeoutMs = timeoutMs
}

const applyLocalEnv = (config: PlaygroundConfig, env: Env): void => {
  const model = readEnvString(env, 'OLLAMA_MODEL')
  if (model) config.local.model = model
  const host = readEnvString(env, 'OLLAMA_HOST')
  if (host) config.local.baseUrl = host
  const timeoutMs = parseEnvNonNegativeInteger(
    'PLAYGROUND_LOCAL_TIMEOUT_MS',
    readEnvString(env, 'PLAYGROUND_LOCAL_TIMEOUT_MS'),
  )
  if (timeoutMs !== undefined) config.local.timeoutMs = timeoutMs
}

const applyDisplayEnv = (config: PlaygroundConfig, env: Env): void => {
  const width = parseEnvWidth(
    'PLAYGROUND_WIDTH',
    readEnvString(env, 'PLAYGROUND_WIDTH'),
  )
  if (width !== undefined) config.display.width = width
  const logFile = readEnvString(env, 'PLAYGROUND_LOG_FILE')
  if (logFile) config.paths.logFile = resolveWorkPath(config.workDir, logFile)
}

export const applyCliEnvOverrides = (
  config: PlaygroundConfig,
  env: Env = process.env,
): void => {
  applyCloudEnv(config, env)
  applyLocalEnv(config, env)
  applyDisplayEnv(config, env)
}
