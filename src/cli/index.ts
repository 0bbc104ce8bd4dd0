#!/usr/bin/env node
import 'dotenv/config'

import { loadConfig } from '../config.js'
import { createCloudClient } from '../llm/cloud-client.js'
import { createLocalClient } from '../llm/local-client.js'
import { appendLog, closeLogs } from '../log/append.js'
import { appendInteraction } from '../log/interaction-log.js'
import { bestEffort, setDefaultLogPath } from '../log/safe.js'
import { runSession } from '../session/loop.js'

import { applyCliArgs, parseCliArgs, USAGE } from './args.js'
import { applyCliEnvOverrides } from './env.js'
import { createPromptReader } from './prompt-reader.js'

import type { PlaygroundConfig } from '../config.js'
import type { Backend } from '../types/query.js'

const parsed = parseCliArgs(process.argv.slice(2))
if (!parsed.ok) {
  console.error(`[cli] ${parsed.error}`)
  console.error(USAGE)
  process.exit(1)
}
const args = parsed.value
if (args.help) {
  console.log(USAGE)
  process.exit(0)
}

const buildConfig = async (): Promise<PlaygroundConfig> => {
  const envConfigPath = process.env['PLAYGROUND_CONFIG']?.trim()
  const configPath = args.configPath ?? (envConfigPath ? envConfigPath : undefined)
  const config = await loadConfig({
    workDir: process.cwd(),
    ...(configPath ? { configPath } : {}),
  })
  applyCliEnvOverrides(config)
  applyCliArgs(config, args)
  return config
}

const buildCloudClient = (config: PlaygroundConfig): Backend | undefined => {
  const { apiKey } = config.cloud
  if (!apiKey) return undefined
  return createCloudClient({ ...config.cloud, apiKey })
}

const printBanner = (config: PlaygroundConfig, hasCloud: boolean): void => {
  console.log('\n=== LLM Playground ===')
  console.log(
    `Compare ${config.cloud.label} and ${config.local.label} responses side by side.\n`,
  )
  if (!hasCloud) {
    console.log(
      `[INFO] No ${config.cloud.label} credential found (OPENAI_API_KEY). Cloud calls will be skipped.\n`,
    )
  }
  console.log('Type your prompt and press Enter. Type "quit" or "exit" to stop.\n')
}

let config: PlaygroundConfig
try {
  config = await buildConfig()
} catch (error) {
  const message = error instanceof Error ? error.message : String(error)
  console.error(`[cli] startup failed: ${message}`)
  process.exit(1)
}

setDefaultLogPath(config.paths.diagnosticsLog)

const cloud = buildCloudClient(config)
const local = createLocalClient(config.local)
printBanner(config, cloud !== undefined)

const reader = createPromptReader(process.stdin, process.stdout, {
  interrupts: process,
})
const { logFile } = config.paths

const outcome = await runSession({
  readPrompt: () => reader.read('You: '),
  write: (text) => {
    process.stdout.write(text)
  },
  local,
  ...(cloud ? { cloud } : {}),
  report: {
    width: config.display.width,
    cloudLabel: config.cloud.label,
    localLabel: config.local.label,
  },
  recordExchange: async (prompt, results) => {
    await appendInteraction(logFile, { prompt, ...results })
  },
})

reader.close()
await bestEffort('cli:log_session_end', () =>
  appendLog(config.paths.diagnosticsLog, {
    event: 'session_end',
    exchanges: outcome.exchanges,
    reason: outcome.reason,
  }),
)
await bestEffort('cli:close_logs', () => closeLogs())
process.exit(0)
