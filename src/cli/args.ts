import { parseArgs } from 'node:util'

import {
  isValidWidth,
  MAX_WIDTH,
  MIN_WIDTH,
  resolveWorkPath,
} from '../config.js'

import type { PlaygroundConfig } from '../config.js'

export type CliArgs = {
  help: boolean
  configPath?: string
  width?: number
  logFile?: string
  cloudModel?: string
  localModel?: string
  localUrl?: string
}

export type CliParseResult =
  | { ok: true; value: CliArgs }
  | { ok: false; error: string }

export const USAGE = [
  'llm-playground [options]',
  '',
  'Options:',
  '  --config <path>        JSON config file (default: playground.config.json)',
  `  --width <n>            Column width, ${MIN_WIDTH}-${MAX_WIDTH} (default: 40)`,
  '  --log-file <path>      Interaction log (default: logs/responses.jsonl)',
  '  --cloud-model <name>   Cloud model identifier',
  '  --local-model <name>   Local model identifier',
  '  --local-url <url>      Local inference server base URL',
  '  -h, --help             Show this help',
].join('\n')

const optionalTrimmed = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

const readFlags = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      width: { type: 'string' },
      'log-file': { type: 'string' },
      'cloud-model': { type: 'string' },
      'local-model': { type: 'string' },
      'local-url': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  }).values

export const parseCliArgs = (argv: string[]): CliParseResult => {
  let values: ReturnType<typeof readFlags>
  try {
    values = readFlags(argv)
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    }
  }

  const value: CliArgs = { help: values.help === true }

  if (values.width !== undefined) {
    const parsed = Number(values.width)
    if (!isValidWidth(parsed)) {
      return {
        ok: false,
        error: `--width must be an integer between ${MIN_WIDTH} and ${MAX_WIDTH}`,
      }
    }
    value.width = parsed
  }

  const configPath = optionalTrimmed(values.config)
  if (configPath) value.configPath = configPath
  const logFile = optionalTrimmed(values['log-file'])
  if (logFile) value.logFile = logFile
  const cloudModel = optionalTrimmed(values['cloud-model'])
  if (cloudModel) value.cloudModel = cloudModel
  const localModel = optionalTrimmed(values['local-model'])
  if (localModel) value.localModel = localModel
  const localUrl = optionalTrimmed(values['local-url'])
  if (localUrl) value.localUrl = localUrl

  return { ok: true, value }
}

export const applyCliArgs = (config: PlaygroundConfig, args: CliArgs): void => {
  if (args.width !== undefined) config.display.width = args.width
  if (args.logFile)
    config.paths.logFile = resolveWorkPath(config.workDir, args.logFile)
  if (args.cloudModel) config.cloud.model = args.cloudModel
  if (args.localModel) config.local.model = args.localModel
  if (args.localUrl) config.local.baseUrl = args.localUrl
}
