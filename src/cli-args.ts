/**
 * Flag parsing for the fetch CLI. Bad input throws UsageError; the CLI prints it with the usage text.
 */

import { toMs } from './config.js'
import { UsageError } from './core/errors.js'
import type { RunOptions } from './core/runner.js'

export type CliCommand = { kind: 'list' } | { kind: 'run'; resource: string; options: RunOptions }

function getFlag(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`)
  return idx >= 0 ? args[idx + 1] : undefined
}

function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(`--${name}`)
}

function intFlag(args: readonly string[], name: string): number | undefined {
  const raw = getFlag(args, name)
  if (raw === undefined) return undefined
  if (!/^-?\d+$/.test(raw.trim())) throw new UsageError(`--${name} must be an integer, got "${raw}"`)
  return parseInt(raw, 10)
}

function numberFlag(args: readonly string[], name: string): number | undefined {
  const raw = getFlag(args, name)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) throw new UsageError(`--${name} must be a number, got "${raw}"`)
  return value
}

function nonNegative(name: string, value: number | undefined): number | undefined {
  if (value !== undefined && value < 0) throw new UsageError(`--${name} must not be negative, got ${value}`)
  return value
}

export function parseCliArgs(args: readonly string[], resources: readonly string[]): CliCommand {
  if (hasFlag(args, 'list')) return { kind: 'list' }

  const resource = getFlag(args, 'resource')
  const outPath = getFlag(args, 'out')
  if (!resource) throw new UsageError('--resource is required')
  if (!outPath) throw new UsageError('--out is required')
  if (!resources.includes(resource)) throw new UsageError(`unknown resource "${resource}"`)

  const sleepSec = nonNegative('sleep', numberFlag(args, 'sleep'))
  return {
    kind: 'run',
    resource,
    options: {
      outPath,
      season: intFlag(args, 'season'),
      league: getFlag(args, 'league'),
      limit: nonNegative('limit', intFlag(args, 'limit')),
      sleepMs: sleepSec === undefined ? undefined : toMs(sleepSec),
    },
  }
}
