import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, it, expect } from 'vitest'
import { DEFAULT_USER_AGENT, loadConfig, loadEnvFile, readSecondsEnv, toMs } from '../config.js'
import { ConfigError } from '../core/errors.js'

describe('loadConfig', () => {
  it('falls back to the built-in defaults', () => {
    expect(loadConfig({})).toEqual({
      userAgent: DEFAULT_USER_AGENT,
      fplSleepMs: 350,
      understatSleepMs: 2500,
    })
  })

  it('reads overrides in seconds', () => {
    const config = loadConfig({
      UNDERSTAT_USER_AGENT: 'test-agent/1.0',
      FPL_SLEEP_SEC: '0.1',
      UNDERSTAT_SLEEP_SEC: ' 4 ',
    })
    expect(config).toEqual({ userAgent: 'test-agent/1.0', fplSleepMs: 100, understatSleepMs: 4000 })
  })

  it('treats blank values as unset', () => {
    const config = loadConfig({ UNDERSTAT_USER_AGENT: ' ', FPL_SLEEP_SEC: '' })
    expect(config.userAgent).toBe(DEFAULT_USER_AGENT)
    expect(config.fplSleepMs).toBe(350)
  })

  it('throws at read time for a malformed number', () => {
    expect(() => loadConfig({ FPL_SLEEP_SEC: 'fast' })).toThrow(ConfigError)
    expect(() => loadConfig({ UNDERSTAT_SLEEP_SEC: '2s' })).toThrow(
      'Environment variable UNDERSTAT_SLEEP_SEC must be a number, got "2s"'
    )
  })
})

describe('readSecondsEnv', () => {
  it('returns the parsed value', () => {
    expect(readSecondsEnv({ X: '1.5' }, 'X', 9)).toBe(1.5)
  })
})

describe('toMs', () => {
  it('rounds to whole milliseconds', () => {
    expect(toMs(0.35)).toBe(350)
    expect(toMs(0.0004)).toBe(0)
  })
})

describe('loadEnvFile', () => {
  const keys = ['FSF_TEST_FROM_FILE', 'FSF_TEST_PRESET']

  afterEach(() => {
    for (const key of keys) delete process.env[key]
  })

  it('loads values without overriding ones already set', () => {
    const dir = mkdtempSync(join(tmpdir(), 'fsf-env-'))
    const path = join(dir, '.env')
    writeFileSync(path, 'FSF_TEST_FROM_FILE=from-file\nFSF_TEST_PRESET=from-file\n', 'utf-8')
    process.env.FSF_TEST_PRESET = 'preset'

    loadEnvFile(path)

    expect(process.env.FSF_TEST_FROM_FILE).toBe('from-file')
    expect(process.env.FSF_TEST_PRESET).toBe('preset')
  })
})
