/**
 * Fan-out aggregation: one request per entity, run sequentially with a
 * fixed pause after each, merged into a single normalized table.
 */

import type { JsonObject } from '../schema/json.js'
import type { CanonicalTable } from '../schema/table.js'
import { normalize } from '../lib/normalize.js'

export type EntityKey = string | number

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms))

export interface CombineOptions {
  /** Pause after every fetch, the last one included */
  pacingMs: number
  /** Column each row is tagged with, holding the entity key it came from */
  tagColumn: string
  numericColumns: readonly string[]
  sleep?: Sleep
  /** Progress label for log lines */
  label?: string
}

const PROGRESS_EVERY = 25

/**
 * Fetch rows for each entity in order and combine them.
 * Any failed fetch rejects the whole build; there is no partial table.
 */
export async function buildCombined<K extends EntityKey>(
  entities: readonly K[],
  fetchOne: (key: K) => Promise<JsonObject[]>,
  options: CombineOptions
): Promise<CanonicalTable> {
  const { pacingMs, tagColumn, numericColumns, sleep: wait = sleep, label = 'combine' } = options
  const rows: JsonObject[] = []

  for (const [i, key] of entities.entries()) {
    const fetched = await fetchOne(key)
    for (const record of fetched) {
      rows.push({ ...record, [tagColumn]: key })
    }

    const done = i + 1
    if (done % PROGRESS_EVERY === 0 && done < entities.length) {
      console.log(`[${label}] ${done}/${entities.length} fetched (${rows.length} rows)`)
    }
    await wait(pacingMs)
  }

  console.log(`[${label}] ${entities.length} entities -> ${rows.length} rows`)
  return normalize(rows, numericColumns)
}
