/**
 * Understat league-page scraper.
 *
 * GET /league/{league}/{season} returns HTML whose inline scripts assign
 * `playersData`, `matchesData` (and `teamsData`) via JSON.parse('...').
 * The script holding a variable is located by its name, then the assignment
 * is decoded with the embedded-JSON extractor.
 */

import * as cheerio from 'cheerio'
import { DEFAULT_USER_AGENT, UNDERSTAT_BASE_URL } from '../config.js'
import { PayloadNotLocatedError } from '../core/errors.js'
import { createScrapeSession, type Session } from '../core/session.js'
import { extractEmbeddedJson } from '../lib/embedded-json.js'
import { normalize } from '../lib/normalize.js'
import { expectRecordArray, type JsonValue } from '../schema/json.js'
import type { CanonicalTable } from '../schema/table.js'

export const DEFAULT_LEAGUE = 'EPL'
export const DEFAULT_SEASON = 2023

export const PLAYER_NUMERIC_COLUMNS = [
  'games',
  'time',
  'goals',
  'xG',
  'assists',
  'xA',
  'shots',
  'key_passes',
  'npg',
  'npxG',
  'xGChain',
  'xGBuildup',
] as const

/** Match rows are flattened: h/a teams, goals, xG and forecast become `<field>_<key>` */
export const MATCH_NUMERIC_COLUMNS = [
  'goals_h',
  'goals_a',
  'xG_h',
  'xG_a',
  'forecast_w',
  'forecast_d',
  'forecast_l',
] as const

export function leagueUrl(league: string, season: number): string {
  return `${UNDERSTAT_BASE_URL}/league/${encodeURIComponent(league)}/${encodeURIComponent(String(season))}`
}

/** Without a session, a scrape session is opened with `userAgent` */
export async function fetchUnderstatLeaguePage(
  league: string = DEFAULT_LEAGUE,
  season: number = DEFAULT_SEASON,
  session?: Session,
  userAgent: string = DEFAULT_USER_AGENT
): Promise<cheerio.CheerioAPI> {
  const url = leagueUrl(league, season)
  const sess = session ?? createScrapeSession(userAgent)
  console.log(`[understat] GET ${url}`)
  const html = await sess.getText(url)
  return cheerio.load(html)
}

/** Text of the first inline script containing `marker`, or null */
export function findScriptContaining($: cheerio.CheerioAPI, marker: string): string | null {
  for (const el of $('script').toArray()) {
    const text = $(el).text()
    if (text.includes(marker)) return text
  }
  return null
}

/** Locate and decode one embedded variable; throws PayloadNotLocatedError rather than returning nothing */
export function extractLeagueData($: cheerio.CheerioAPI, variable: string): JsonValue {
  const script = findScriptContaining($, variable)
  if (script === null) {
    throw new PayloadNotLocatedError(variable, 'script')
  }
  const result = extractEmbeddedJson(script, variable)
  if (!result.found) {
    throw new PayloadNotLocatedError(variable, 'variable')
  }
  return result.value
}

async function fetchLeagueTable(
  variable: string,
  numericColumns: readonly string[],
  league: string,
  season: number,
  session?: Session,
  userAgent?: string
): Promise<CanonicalTable> {
  const $ = await fetchUnderstatLeaguePage(league, season, session, userAgent)
  const records = expectRecordArray(extractLeagueData($, variable), variable)
  console.log(`[understat] ${variable}: ${records.length} records for ${league} ${season}`)
  return normalize(records, numericColumns)
}

/** Season totals per player: xG, xA, shots, key passes, xGChain, xGBuildup */
export async function fetchUnderstatPlayers(
  league: string = DEFAULT_LEAGUE,
  season: number = DEFAULT_SEASON,
  session?: Session,
  userAgent?: string
): Promise<CanonicalTable> {
  return fetchLeagueTable('playersData', PLAYER_NUMERIC_COLUMNS, league, season, session, userAgent)
}

/** One row per fixture with goals, xG and pre-match forecast */
export async function fetchUnderstatMatches(
  league: string = DEFAULT_LEAGUE,
  season: number = DEFAULT_SEASON,
  session?: Session,
  userAgent?: string
): Promise<CanonicalTable> {
  return fetchLeagueTable('matchesData', MATCH_NUMERIC_COLUMNS, league, season, session, userAgent)
}
