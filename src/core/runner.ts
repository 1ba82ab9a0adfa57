/**
 * Core runner: resolve resource, open session, build, write output.
 *
 * Failures are not caught here; the CLI reports them and exits non-zero.
 */

import type { FetchConfig } from '../config.js'
import { fetchFplBootstrap, fetchFplFixtures, buildFplPlayerGameweeks } from '../platforms/fpl-api.js'
import {
  DEFAULT_LEAGUE,
  DEFAULT_SEASON,
  fetchUnderstatMatches,
  fetchUnderstatPlayers,
} from '../platforms/understat.js'
import type { ResourceResult } from '../schema/table.js'
import { sleep as realSleep, type Sleep } from './aggregate.js'
import { writeResult } from './output.js'
import { Session, createScrapeSession, type FetchImpl } from './session.js'

export interface RunOptions {
  outPath: string
  season?: number
  league?: string
  /** Only the first N players (fpl_histories) */
  limit?: number
  /** Overrides config.fplSleepMs */
  sleepMs?: number
}

/** Injection points for tests */
export interface RunDeps {
  fetchImpl?: FetchImpl
  sleep?: Sleep
}

export interface ResourceContext {
  options: RunOptions
  config: FetchConfig
  fetchImpl?: FetchImpl
  sleep: Sleep
}

export type ResourceBuilder = (ctx: ResourceContext) => Promise<ResourceResult>

export interface RunResult {
  resource: string
  outPath: string
  /** null for raw JSON resources */
  rowCount: number | null
  durationMs: number
}

const resources = new Map<string, ResourceBuilder>()

export function registerResource(name: string, builder: ResourceBuilder): void {
  resources.set(name, builder)
}

export function listResources(): string[] {
  return [...resources.keys()]
}

function restSession(ctx: ResourceContext): Session {
  return new Session({ fetchImpl: ctx.fetchImpl })
}

/** One scrape session per run, opened after the politeness pause */
async function scrapeSession(ctx: ResourceContext): Promise<Session> {
  const session = createScrapeSession(ctx.config.userAgent, { fetchImpl: ctx.fetchImpl })
  await ctx.sleep(ctx.config.understatSleepMs)
  return session
}

registerResource('fpl_bootstrap', async ctx => ({
  kind: 'json',
  payload: await fetchFplBootstrap(restSession(ctx)),
}))

registerResource('fpl_fixtures', async ctx => ({
  kind: 'json',
  payload: await fetchFplFixtures(restSession(ctx)),
}))

registerResource('fpl_histories', async ctx => ({
  kind: 'table',
  table: await buildFplPlayerGameweeks({
    limit: ctx.options.limit,
    sleepMs: ctx.options.sleepMs ?? ctx.config.fplSleepMs,
    session: restSession(ctx),
    sleep: ctx.sleep,
  }),
}))

registerResource('understat_players', async ctx => {
  const session = await scrapeSession(ctx)
  return {
    kind: 'table',
    table: await fetchUnderstatPlayers(
      ctx.options.league ?? DEFAULT_LEAGUE,
      ctx.options.season ?? DEFAULT_SEASON,
      session
    ),
  }
})

registerResource('understat_matches', async ctx => {
  const session = await scrapeSession(ctx)
  return {
    kind: 'table',
    table: await fetchUnderstatMatches(
      ctx.options.league ?? DEFAULT_LEAGUE,
      ctx.options.season ?? DEFAULT_SEASON,
      session
    ),
  }
})

/**
 * Build one resource and write it to `options.outPath`.
 */
export async function runResource(
  resource: string,
  options: RunOptions,
  config: FetchConfig,
  deps: RunDeps = {}
): Promise<RunResult> {
  const startTime = Date.now()

  const builder = resources.get(resource)
  if (!builder) {
    throw new Error(`Unsupported resource: ${resource} (available: ${listResources().join(', ')})`)
  }

  console.log(`[${resource}] Building...`)
  const result = await builder({
    options,
    config,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep ?? realSleep,
  })
  await writeResult(result, options.outPath)

  return {
    resource,
    outPath: options.outPath,
    rowCount: result.kind === 'table' ? result.table.rows.length : null,
    durationMs: Date.now() - startTime,
  }
}
