import { describe, it, expect } from 'vitest'
import {
  escapeScriptString,
  extractArrayLiteralAssignment,
  extractEmbeddedJson,
  extractJsonParseAssignment,
  unescapeScriptString,
} from '../embedded-json.js'
import type { JsonValue } from '../../schema/json.js'

function embed(name: string, value: JsonValue): string {
  return `var ${name} = JSON.parse('${escapeScriptString(JSON.stringify(value))}');`
}

describe('extractEmbeddedJson', () => {
  const values: JsonValue[] = [
    [{ id: '647', player_name: "N'Golo Kanté", team_title: 'Chelsea,Leicester', xG: '0.123' }],
    { nested: { quote: '"', slash: 'a/b', backslash: 'c\\d', tag: '</script>', emoji: '⚽ 😀' } },
    'plain string',
    42,
    null,
    [],
  ]

  it.each(values.map((v): [string, JsonValue] => [JSON.stringify(v), v]))('recovers %s through the escaped JSON.parse form', (_, value) => {
    expect(extractEmbeddedJson(embed('X', value), 'X')).toEqual({ found: true, value })
  })

  it('decodes \\x escapes as served in page scripts', () => {
    const script = String.raw`var playersData = JSON.parse('\x5B\x7B\x22id\x22\x3A\x22647\x22\x7D\x5D');`
    expect(extractEmbeddedJson(script, 'playersData')).toEqual({ found: true, value: [{ id: '647' }] })
  })

  it('reads past an escaped single quote inside the literal', () => {
    const script = String.raw`var X = JSON.parse('["N'Golo"]');`
    expect(extractJsonParseAssignment(script, 'X')).toEqual({ found: true, value: ["N'Golo"] })
  })

  it('falls back to a bare array literal', () => {
    expect(extractEmbeddedJson('var X = [1,2,3];', 'X')).toEqual({ found: true, value: [1, 2, 3] })
  })

  it('matches a multi-line array literal without running into the next var', () => {
    const script = 'var teams = [\n  {"a": 1},\n  {"b": 2}\n];\nvar other = [4];'
    expect(extractEmbeddedJson(script, 'teams')).toEqual({ found: true, value: [{ a: 1 }, { b: 2 }] })
    expect(extractEmbeddedJson(script, 'other')).toEqual({ found: true, value: [4] })
  })

  it('keeps adjacent JSON.parse assignments apart', () => {
    const script = String.raw`var a = JSON.parse('\x5B1\x5D'); var b = JSON.parse('\x5B2\x5D');`
    expect(extractEmbeddedJson(script, 'a')).toEqual({ found: true, value: [1] })
    expect(extractEmbeddedJson(script, 'b')).toEqual({ found: true, value: [2] })
  })

  it('reports not found when the variable is absent', () => {
    expect(extractEmbeddedJson('var other = 1;', 'X')).toEqual({ found: false })
  })

  it('does not match a longer variable name with the same prefix', () => {
    expect(extractEmbeddedJson('var playersDataOld = [1];', 'playersData')).toEqual({ found: false })
  })

  it('throws when a located assignment is not valid JSON', () => {
    expect(() => extractEmbeddedJson("var X = JSON.parse('{broken')", 'X')).toThrow(SyntaxError)
  })

  it('tries each form independently', () => {
    expect(extractJsonParseAssignment('var X = [1];', 'X')).toEqual({ found: false })
    expect(extractArrayLiteralAssignment(embed('X', [1]), 'X')).toEqual({ found: false })
  })
})

describe('unescapeScriptString', () => {
  it('decodes hex, unicode and quote escapes and keeps unknown ones', () => {
    expect(unescapeScriptString(String.raw`\x41\u00e9\'\/\\`)).toBe("Aé'\\/\\")
  })

  it('decodes control and octal escapes', () => {
    expect(unescapeScriptString(String.raw`a\tb\nc\101`)).toBe('a\tb\ncA')
  })

  it('leaves a trailing backslash alone', () => {
    expect(unescapeScriptString('end\\')).toBe('end\\')
  })
})

describe('escapeScriptString', () => {
  it('escapes quotes, slashes and non-ASCII', () => {
    expect(escapeScriptString(`{"a":"b/c'é"}`)).toBe(String.raw`{\x22a\x22:\x22b\x2fc\x27\xe9\x22}`)
  })
})
