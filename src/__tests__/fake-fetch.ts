/**
 * In-process fetch stand-in for tests: routes by exact URL, records every call.
 */

import type { FetchImpl } from '../core/session.js'
import { escapeScriptString } from '../lib/embedded-json.js'
import type { JsonValue } from '../schema/json.js'

export interface FakeRoute {
  status?: number
  statusText?: string
  body: string
}

export interface FakeCall {
  url: string
  headers: Headers
}

export interface FakeFetch {
  fetchImpl: FetchImpl
  calls: FakeCall[]
}

export function fakeFetch(
  routes: Record<string, FakeRoute | JsonValue>,
  onCall?: (url: string) => void
): FakeFetch {
  const calls: FakeCall[] = []
  const fetchImpl: FetchImpl = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    calls.push({ url, headers: new Headers(init?.headers) })
    onCall?.(url)

    if (!Object.hasOwn(routes, url)) {
      return new Response('not found', { status: 404, statusText: 'Not Found' })
    }
    const route = routes[url]
    if (isFakeRoute(route)) {
      return new Response(route.body, { status: route.status ?? 200, statusText: route.statusText })
    }
    return new Response(JSON.stringify(route), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    })
  }
  return { fetchImpl, calls }
}

function isFakeRoute(value: FakeRoute | JsonValue): value is FakeRoute {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && typeof value.body === 'string'
}

/** Script body assigning `value` the way league pages do */
export function embedScript(name: string, value: JsonValue): string {
  return `var ${name} = JSON.parse('${escapeScriptString(JSON.stringify(value))}');`
}

export function htmlPage(scripts: string[]): string {
  return [
    '<!DOCTYPE html>',
    '<html><head><title>League</title></head><body>',
    '<div class="chemp"></div>',
    ...scripts.map(s => `<script>\n\t${s}\n</script>`),
    '</body></html>',
  ].join('\n')
}
