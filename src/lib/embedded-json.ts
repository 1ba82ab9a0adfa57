/**
 * Embedded JSON extraction from inline page scripts.
 *
 * Pages serve their data as `var name = JSON.parse('...')` with the JSON
 * string escaped for a single-quoted JS literal (mostly \xNN escapes), or
 * occasionally as a bare array literal `var name = [...];`.
 */

import type { JsonValue } from '../schema/json.js'

export type ExtractResult = { found: true; value: JsonValue } | { found: false }

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07',
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Decode backslash escapes in a captured JS string body.
 * Unrecognised escapes (e.g. `\/`) are kept as-is, backslash included.
 */
export function unescapeScriptString(raw: string): string {
  let out = ''
  let i = 0
  while (i < raw.length) {
    const ch = raw[i]
    if (ch !== '\\' || i + 1 >= raw.length) {
      out += ch
      i++
      continue
    }

    const next = raw[i + 1]
    const simple = SIMPLE_ESCAPES[next]
    if (simple !== undefined) {
      out += simple
      i += 2
      continue
    }

    if (next === '\n') {
      i += 2
      continue
    }

    const hexWidth = next === 'x' ? 2 : next === 'u' ? 4 : next === 'U' ? 8 : 0
    if (hexWidth > 0) {
      const hex = raw.slice(i + 2, i + 2 + hexWidth)
      if (hex.length === hexWidth && /^[0-9a-fA-F]+$/.test(hex)) {
        out += String.fromCodePoint(parseInt(hex, 16))
        i += 2 + hexWidth
        continue
      }
    }

    const octal = /^[0-7]{1,3}/.exec(raw.slice(i + 1, i + 4))
    if (octal) {
      out += String.fromCharCode(parseInt(octal[0], 8))
      i += 1 + octal[0].length
      continue
    }

    out += ch + next
    i += 2
  }
  return out
}

/**
 * Escape text for a single-quoted JS literal the way the pages do:
 * quotes, slashes, angle brackets and anything outside printable ASCII become \xNN or \uNNNN.
 */
export function escapeScriptString(text: string): string {
  let out = ''
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    const ch = text[i]
    const printable = code >= 0x20 && code < 0x7f && !`'"\\/<>`.includes(ch)
    if (printable) {
      out += ch
    } else if (code <= 0xff) {
      out += '\\x' + code.toString(16).padStart(2, '0')
    } else {
      out += '\\u' + code.toString(16).padStart(4, '0')
    }
  }
  return out
}

/** Match `var <name> = JSON.parse('<escaped>')` and decode it; an escaped `\'` inside the literal does not end it */
export function extractJsonParseAssignment(scriptText: string, variableName: string): ExtractResult {
  const pattern = new RegExp(
    `var\\s+${escapeRegExp(variableName)}\\s*=\\s*JSON\\.parse\\('((?:[^'\\\\]|\\\\[\\s\\S])*)'\\)`
  )
  const match = pattern.exec(scriptText)
  if (!match) return { found: false }
  const value: JsonValue = JSON.parse(unescapeScriptString(match[1]))
  return { found: true, value }
}

/** Match `var <name> = [ ... ];`, lazily, across lines */
export function extractArrayLiteralAssignment(scriptText: string, variableName: string): ExtractResult {
  const pattern = new RegExp(`var\\s+${escapeRegExp(variableName)}\\s*=\\s*(\\[[\\s\\S]*?\\]);`)
  const match = pattern.exec(scriptText)
  if (!match) return { found: false }
  const value: JsonValue = JSON.parse(match[1])
  return { found: true, value }
}

/** Recover the JSON value assigned to `variableName`, trying JSON.parse first, then a bare array */
export function extractEmbeddedJson(scriptText: string, variableName: string): ExtractResult {
  const parsed = extractJsonParseAssignment(scriptText, variableName)
  if (parsed.found) return parsed
  return extractArrayLiteralAssignment(scriptText, variableName)
}
