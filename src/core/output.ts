/**
 * Output writers for raw JSON payloads and canonical tables.
 * Table format follows the destination suffix: .csv, .json, .parquet/.pq; anything else is CSV.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, extname } from 'node:path'
import parquet, { type ParquetFieldDefinition } from 'parquetjs-lite'
import type { JsonValue } from '../schema/json.js'
import type { CanonicalRecord, CanonicalTable, ResourceResult, Scalar } from '../schema/table.js'

export type TableFormat = 'csv' | 'json' | 'parquet'

export function tableFormat(outputPath: string): TableFormat {
  const suffix = extname(outputPath).toLowerCase()
  if (suffix === '.json') return 'json'
  if (suffix === '.parquet' || suffix === '.pq') return 'parquet'
  return 'csv'
}

/** Escape a value for CSV (RFC 4180) */
function esc(val: Scalar): string {
  const str = val == null ? '' : String(val)
  if (str.includes('"') || str.includes(',') || str.includes('\n') || str.includes('\r')) {
    return '"' + str.replace(/"/g, '""') + '"'
  }
  return str
}

export function toCsv(table: CanonicalTable): string {
  const header = table.columns.map(esc).join(',')
  const rows = table.rows.map(row => table.columns.map(col => esc(row[col])).join(','))
  return [header, ...rows].join('\n') + '\n'
}

/**
 * Parquet field per column, all optional. Declared numeric columns are DOUBLE;
 * other columns are DOUBLE or BOOLEAN when every present value is one, else UTF8.
 */
export function parquetFields(table: CanonicalTable): Record<string, ParquetFieldDefinition> {
  const numeric = new Set(table.numericColumns)
  const fields: Record<string, ParquetFieldDefinition> = {}
  for (const col of table.columns) {
    const present = table.rows.map(row => row[col]).filter(v => v !== null)
    const type = numeric.has(col)
      ? 'DOUBLE'
      : present.length > 0 && present.every(v => typeof v === 'number')
        ? 'DOUBLE'
        : present.length > 0 && present.every(v => typeof v === 'boolean')
          ? 'BOOLEAN'
          : 'UTF8'
    fields[col] = { type, optional: true }
  }
  return fields
}

function parquetRow(row: CanonicalRecord, fields: Record<string, ParquetFieldDefinition>): Record<string, Scalar> {
  const out: Record<string, Scalar> = {}
  for (const [col, field] of Object.entries(fields)) {
    const value = row[col]
    // nulls are left out; every field is optional
    if (value === null) continue
    out[col] = field.type === 'UTF8' ? String(value) : value
  }
  return out
}

async function writeParquet(table: CanonicalTable, outputPath: string): Promise<void> {
  if (table.columns.length === 0) {
    throw new Error(`Cannot write a table without columns to Parquet (${outputPath})`)
  }
  const fields = parquetFields(table)
  const writer = await parquet.ParquetWriter.openFile(new parquet.ParquetSchema(fields), outputPath)
  try {
    for (const row of table.rows) {
      await writer.appendRow(parquetRow(row, fields))
    }
  } finally {
    await writer.close()
  }
}

function ensureParent(path: string): void {
  mkdirSync(dirname(path), { recursive: true })
}

export function writeJson(payload: JsonValue, outputPath: string): void {
  ensureParent(outputPath)
  writeFileSync(outputPath, JSON.stringify(payload, null, 2) + '\n', 'utf-8')
  console.log(`[ok] wrote ${outputPath}`)
}

export async function writeTable(table: CanonicalTable, outputPath: string): Promise<void> {
  ensureParent(outputPath)
  const format = tableFormat(outputPath)
  if (format === 'parquet') {
    await writeParquet(table, outputPath)
  } else if (format === 'json') {
    writeFileSync(outputPath, JSON.stringify(table.rows, null, 2) + '\n', 'utf-8')
  } else {
    writeFileSync(outputPath, toCsv(table), 'utf-8')
  }
  console.log(`[ok] wrote ${outputPath} (${table.rows.length.toLocaleString('en-US')} rows)`)
}

/** JSON resources are always written as JSON; tables by suffix */
export async function writeResult(result: ResourceResult, outputPath: string): Promise<void> {
  if (result.kind === 'json') {
    writeJson(result.payload, outputPath)
  } else {
    await writeTable(result.table, outputPath)
  }
}
