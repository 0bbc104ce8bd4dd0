import { once } from 'node:events'
import { basename, dirname } from 'node:path'

import pino, { type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

import { ensureDir } from '../fs/ensure.js'

const MAX_BYTES = 5 * 1024 * 1024
const MAX_FILES = 5

type LoggerBundle = {
  logger: Logger
  stream: RotatingFileStream
}

const loggers = new Map<string, Promise<LoggerBundle>>()

const buildBundle = async (path: string): Promise<LoggerBundle> => {
  const dir = dirname(path)
  await ensureDir(dir)
  const stream = createStream(basename(path), {
    size: `${Math.floor(MAX_BYTES / (1024 * 1024))}M`,
    path: dir,
    maxFiles: MAX_FILES,
  })
  stream.on('error', (error) => {
    console.error('[log] stream error', error)
  })
  const logger = pino(
    {
      base: { app: 'llm-playground' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  )
  return { logger, stream }
}

const getBundle = (path: string): Promise<LoggerBundle> => {
  const existing = loggers.get(path)
  if (existing) return existing
  const pending = buildBundle(path)
  loggers.set(path, pending)
  void pending.catch(() => loggers.delete(path))
  return pending
}

const flushIfNeeded = async (stream: RotatingFileStream): Promise<void> => {
  if (!stream.writableNeedDrain) return
  await once(stream, 'drain')
}

export const appendLog = async (
  path: string,
  entry: Record<string, unknown>,
): Promise<void> => {
  const { logger, stream } = await getBundle(path)
  if (entry['event'] === 'error') logger.error(entry)
  else logger.info(entry)
  await flushIfNeeded(stream)
}

export const closeLogs = async (): Promise<void> => {
  const pending = [...loggers.values()]
  loggers.clear()
  const bundles = await Promise.all(pending)
  await Promise.all(
    bundles.map(async ({ stream }) => {
      const finished = once(stream, 'finish')
      stream.end()
      await finished
    }),
  )
}
