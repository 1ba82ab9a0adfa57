/**
 * Flattens raw source records and coerces declared
 * numeric columns, producing a column-complete CanonicalTable.
 */

import type { JsonObject, JsonValue } from '../schema/json.js'
import type { CanonicalRecord, CanonicalTable, Scalar } from '../schema/table.js'

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Parse a plain decimal string ("12", "-3.5", ".5", "1e3"); null for anything else */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim()
  if (!DECIMAL.test(trimmed)) return null
  const num = Number(trimmed)
  return Number.isFinite(num) ? num : null
}

/** Coerce one cell to a number, or null when it can't be */
export function coerceNumeric(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string') return parseDecimal(value)
  return null
}

/**
 * Flatten nested objects into `parent_child` keys.
 * Arrays are kept as their JSON text so every value stays a scalar; an empty
 * object is null under its own key. When two paths flatten to the same key the first one wins.
 */
export function flattenRecord(record: JsonObject, separator = '_'): Record<string, Scalar> {
  const out: Record<string, Scalar> = {}
  const set = (key: string, value: Scalar) => {
    if (!Object.hasOwn(out, key)) out[key] = value
  }
  const visit = (value: JsonValue, key: string) => {
    if (Array.isArray(value)) {
      set(key, JSON.stringify(value))
    } else if (typeof value === 'object' && value !== null) {
      const entries = Object.entries(value)
      if (entries.length === 0) set(key, null)
      for (const [child, inner] of entries) {
        visit(inner, `${key}${separator}${child}`)
      }
    } else {
      set(key, value)
    }
  }
  for (const [key, value] of Object.entries(record)) visit(value, key)
  return out
}

/** Build a CanonicalTable from heterogeneous records, preserving row order */
export function normalize(
  records: readonly JsonObject[],
  numericColumns: readonly string[]
): CanonicalTable {
  const flat = records.map(r => flattenRecord(r))

  const seen = new Set<string>()
  const columns: string[] = []
  for (const row of flat) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key)
        columns.push(key)
      }
    }
  }

  const numeric = new Set(numericColumns)
  const rows: CanonicalRecord[] = flat.map(row => {
    const out: Record<string, Scalar> = {}
    for (const col of columns) {
      const raw = Object.hasOwn(row, col) ? row[col] : null
      out[col] = numeric.has(col) ? coerceNumeric(raw) : raw
    }
    return Object.freeze(out)
  })

  return Object.freeze({
    columns: Object.freeze(columns),
    numericColumns: Object.freeze([...numericColumns]),
    rows: Object.freeze(rows),
  })
}
