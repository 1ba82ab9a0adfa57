/**
 * JSON value model shared by both sources, plus the narrowing helpers
 * the clients use before handing records to the normalizer.
 */

import { PayloadShapeError } from '../core/errors.js'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject
export interface JsonObject {
  [key: string]: JsonValue
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Narrow a payload to an array of objects, or throw naming what was expected */
export function expectRecordArray(value: JsonValue | undefined, label: string): JsonObject[] {
  if (!Array.isArray(value)) {
    throw new PayloadShapeError(`${label}: expected an array, got ${describe(value)}`)
  }
  const records: JsonObject[] = []
  value.forEach((item, i) => {
    if (!isJsonObject(item)) {
      throw new PayloadShapeError(`${label}[${i}]: expected an object, got ${describe(item)}`)
    }
    records.push(item)
  })
  return records
}

export function expectObject(value: JsonValue | undefined, label: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new PayloadShapeError(`${label}: expected an object, got ${describe(value)}`)
  }
  return value
}

function describe(value: JsonValue | undefined): string {
  if (value === undefined) return 'nothing'
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'an array'
  return typeof value
}
