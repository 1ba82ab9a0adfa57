/**
 * Request session: shared headers and a bounded timeout for every GET
 * made against one source. Pass a session into several calls to reuse it.
 */

import { HttpStatusError } from './errors.js'
import type { JsonValue } from '../schema/json.js'

export const DEFAULT_TIMEOUT_MS = 60_000

export type FetchImpl = typeof fetch

export interface SessionOptions {
  userAgent?: string
  headers?: Record<string, string>
  timeoutMs?: number
  fetchImpl?: FetchImpl
}

export class Session {
  readonly headers: Readonly<Record<string, string>>
  readonly timeoutMs: number
  private readonly fetchImpl: FetchImpl

  constructor(options: SessionOptions = {}) {
    const { userAgent, headers = {}, timeoutMs = DEFAULT_TIMEOUT_MS, fetchImpl = fetch } = options
    this.headers = userAgent ? { ...headers, 'User-Agent': userAgent } : { ...headers }
    this.timeoutMs = timeoutMs
    this.fetchImpl = fetchImpl
  }

  get userAgent(): string | undefined {
    return this.headers['User-Agent']
  }

  /** GET `url` and return the body text; throws HttpStatusError on non-2xx */
  async getText(url: string): Promise<string> {
    return this.request(url, res => res.text())
  }

  /** GET `url` and return the parsed JSON body, untouched */
  async getJson(url: string): Promise<JsonValue> {
    const text = await this.request(url, res => res.text())
    const value: JsonValue = JSON.parse(text)
    return value
  }

  private async request<T>(url: string, read: (res: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const res = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
      })
      if (!res.ok) {
        throw new HttpStatusError(res.status, res.statusText, url)
      }
      return await read(res)
    } finally {
      clearTimeout(timer)
    }
  }
}

/** Reuse `existing` when the caller has one, otherwise open a new session */
export function acquireSession(existing?: Session, options?: SessionOptions): Session {
  return existing ?? new Session(options)
}

/** Session for HTML sources, which serve full pages only to browser-like agents */
export function createScrapeSession(userAgent: string, options: SessionOptions = {}): Session {
  return new Session({
    ...options,
    userAgent,
    headers: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      ...options.headers,
    },
  })
}
