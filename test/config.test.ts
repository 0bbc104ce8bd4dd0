import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, expect, test } from 'vitest'

import {
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  loadConfig,
  parseConfigFile,
} from '../src/config.js'

let workDir = ''

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'llm-playground-config-'))
})

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true })
})

test('loadConfig falls back to defaults without a config file', async () => {
  await expect(loadConfig({ workDir })).resolves.toEqual(
    defaultConfig({ workDir }),
  )
})

test('loadConfig merges a partial config file over the defaults', async () => {
  await writeFile(
    join(workDir, DEFAULT_CONFIG_FILE),
    JSON.stringify({
      cloud: { model: 'gpt-test', pricing: { inputPerMillion: 1 } },
      display: { width: 60 },
      paths: { logFile: 'out/log.jsonl' },
    }),
  )

  const config = await loadConfig({ workDir })

  expect(config.cloud.model).toBe('gpt-test')
  expect(config.cloud.pricing).toEqual({
    inputPerMillion: 1,
    outputPerMillion: 0.6,
  })
  expect(config.cloud.label).toBe('OpenAI')
  expect(config.display.width).toBe(60)
  expect(config.paths.logFile).toBe(join(workDir, 'out', 'log.jsonl'))
  expect(config.paths.diagnosticsLog).toBe(join(workDir, 'logs', 'playground.log'))
})

test('loadConfig fails when an explicit config file is missing', async () => {
  await expect(
    loadConfig({ workDir, configPath: 'missing.json' }),
  ).rejects.toMatchObject({ code: 'ENOENT' })
})

test('parseConfigFile names the offending field', () => {
  expect(() =>
    parseConfigFile('{"display":{"width":19}}', 'playground.config.json'),
  ).toThrow('[config] playground.config.json display.width:')
})

test('parseConfigFile rejects unknown keys', () => {
  expect(() => parseConfigFile('{"colour":"blue"}', 'cfg.json')).toThrow(
    "Unrecognized key(s) in object: 'colour'",
  )
})

test('parseConfigFile rejects a credential in the file', () => {
  expect(() =>
    parseConfigFile('{"cloud":{"apiKey":"test-secret"}}', 'cfg.json'),
  ).toThrow('[config] cfg.json cloud:')
})

test('parseConfigFile reports malformed JSON', () => {
  expect(() => parseConfigFile('{', 'cfg.json')).toThrow(
    '[config] cfg.json is not valid JSON:',
  )
})
