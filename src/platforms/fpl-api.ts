/**
 * Fantasy Premier League REST API client.
 *
 * Endpoints (all JSON, public, no auth):
 *   /bootstrap-static/         players (elements), teams, gameweeks
 *   /fixtures/                 every fixture of the season
 *   /element-summary/{id}/     one player's per-gameweek history
 *
 * Payloads are returned verbatim; coercion happens in the normalizer.
 */

import { FPL_BASE_URL } from '../config.js'
import { buildCombined, type Sleep } from '../core/aggregate.js'
import { PayloadShapeError } from '../core/errors.js'
import { acquireSession, type Session } from '../core/session.js'
import { expectObject, expectRecordArray, type JsonObject, type JsonValue } from '../schema/json.js'
import type { CanonicalTable } from '../schema/table.js'

export const HISTORY_NUMERIC_COLUMNS = [
  'round',
  'total_points',
  'minutes',
  'goals_scored',
  'assists',
  'clean_sheets',
  'goals_conceded',
  'own_goals',
  'penalties_saved',
  'penalties_missed',
  'yellow_cards',
  'red_cards',
  'saves',
  'bonus',
  'bps',
  'influence',
  'creativity',
  'threat',
  'ict_index',
] as const

/** GET a path under the API base and return the JSON body */
export async function getJson(resourcePath: string, session?: Session): Promise<JsonValue> {
  const path = resourcePath.startsWith('/') ? resourcePath : `/${resourcePath}`
  return acquireSession(session).getJson(`${FPL_BASE_URL}${path}`)
}

export async function fetchFplBootstrap(session?: Session): Promise<JsonObject> {
  return expectObject(await getJson('/bootstrap-static/', session), 'bootstrap-static')
}

export async function fetchFplFixtures(session?: Session): Promise<JsonObject[]> {
  return expectRecordArray(await getJson('/fixtures/', session), 'fixtures')
}

export async function fetchFplPlayerHistory(elementId: number, session?: Session): Promise<JsonObject> {
  return expectObject(
    await getJson(`/element-summary/${elementId}/`, session),
    `element-summary/${elementId}`
  )
}

/** Player ids from bootstrap `elements`, in payload order, optionally the first `limit` */
export function bootstrapElementIds(bootstrap: JsonObject, limit?: number): number[] {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new RangeError(`limit must be a non-negative integer, got ${limit}`)
  }
  const elements = expectRecordArray(bootstrap.elements, 'bootstrap-static.elements')
  const selected = limit === undefined ? elements : elements.slice(0, limit)
  return selected.map((element, i) => {
    const id = element.id
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new PayloadShapeError(`bootstrap-static.elements[${i}].id: expected an integer`)
    }
    return id
  })
}

/** Gameweek rows of an element-summary payload; a summary without `history` has none */
export function historyRows(summary: JsonObject, elementId: number): JsonObject[] {
  if (summary.history === undefined) return []
  return expectRecordArray(summary.history, `element-summary/${elementId}.history`)
}

export interface GameweekOptions {
  limit?: number
  sleepMs: number
  session?: Session
  sleep?: Sleep
}

/**
 * Per-player gameweek history for every player in bootstrap (or the first `limit`),
 * one request per player on a shared session, tagged with `element`.
 */
export async function buildFplPlayerGameweeks(options: GameweekOptions): Promise<CanonicalTable> {
  const session = acquireSession(options.session)
  const bootstrap = await fetchFplBootstrap(session)
  const ids = bootstrapElementIds(bootstrap, options.limit)
  console.log(`[fpl] Fetching history for ${ids.length} players (${options.sleepMs}ms pacing)...`)

  return buildCombined(
    ids,
    async id => historyRows(await fetchFplPlayerHistory(id, session), id),
    {
      pacingMs: options.sleepMs,
      tagColumn: 'element',
      numericColumns: HISTORY_NUMERIC_COLUMNS,
      sleep: options.sleep,
      label: 'histories',
    }
  )
}
