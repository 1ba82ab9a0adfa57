/**
 * Canonical table schema — every resource that produces rows normalizes into this.
 * This is the single output shape for the CSV and JSON writers.
 */

import type { JsonValue } from './json.js'

export type Scalar = string | number | boolean | null

/** One row. Every table column is present; a key missing from the source row is null. */
export type CanonicalRecord = Readonly<Record<string, Scalar>>

export interface CanonicalTable {
  /** Union of source keys, in order of first appearance */
  readonly columns: readonly string[]
  /** Declared numeric columns; their cells hold a number or null */
  readonly numericColumns: readonly string[]
  readonly rows: readonly CanonicalRecord[]
}

/** What a resource build hands to the output writer */
export type ResourceResult =
  | { kind: 'json'; payload: JsonValue }
  | { kind: 'table'; table: CanonicalTable }
