/**
 * Source URLs, user agent and pacing, overridable via configs/.env.
 */

import { config as loadDotenv } from 'dotenv'
import { resolve } from 'node:path'
import { ConfigError } from './core/errors.js'
import { parseDecimal } from './lib/normalize.js'

export const FPL_BASE_URL = 'https://fantasy.premierleague.com/api'
export const UNDERSTAT_BASE_URL = 'https://understat.com'

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/126.0 Safari/537.36'

export const DEFAULT_FPL_SLEEP_SEC = 0.35
export const DEFAULT_UNDERSTAT_SLEEP_SEC = 2.5

export interface FetchConfig {
  userAgent: string
  /** Pause after each per-player FPL request */
  fplSleepMs: number
  /** Pause before the first Understat request of a run */
  understatSleepMs: number
}

type Env = Record<string, string | undefined>

/** Load configs/.env into process.env; variables already set win */
export function loadEnvFile(path = 'configs/.env'): void {
  loadDotenv({ path: resolve(path), override: false })
}

/** Read a seconds value; blank or unset means the default, anything unparsable throws */
export function readSecondsEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  const value = parseDecimal(raw)
  if (value === null) {
    throw new ConfigError(name, `Environment variable ${name} must be a number, got ${JSON.stringify(raw)}`)
  }
  return value
}

export function toMs(seconds: number): number {
  return Math.round(seconds * 1000)
}

export function loadConfig(env: Env = process.env): FetchConfig {
  return {
    userAgent: env.UNDERSTAT_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    fplSleepMs: toMs(readSecondsEnv(env, 'FPL_SLEEP_SEC', DEFAULT_FPL_SLEEP_SEC)),
    understatSleepMs: toMs(readSecondsEnv(env, 'UNDERSTAT_SLEEP_SEC', DEFAULT_UNDERSTAT_SLEEP_SEC)),
  }
}
