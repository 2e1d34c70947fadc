/**
 * HttpClient - the request primitive the realtime channels post through
 *
 * Builds URLs against the base URL, attaches language and auth headers,
 * applies a per-request timeout and maps HTTP failures to
 * `ClientResponseError`.
 *
 * @module client/http
 */

import { ClientResponseError } from './errors'
import type { AuthStore } from './auth'

// ============================================================================
// Constants
// ============================================================================

/** Default timeout for requests in milliseconds */
export const DEFAULT_TIMEOUT = 60_000

/** Default value of the `Accept-Language` header */
export const DEFAULT_LANG = 'en-US'

// ============================================================================
// Types
// ============================================================================

export type QueryParams = Record<string, unknown>

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export interface SendOptions {
  method?: HttpMethod
  headers?: Record<string, string>
  query?: QueryParams
  body?: unknown
  signal?: AbortSignal
  /** Overrides the client timeout for this request, in milliseconds */
  timeout?: number
}

/**
 * The request primitive consumed by the realtime channels.
 */
export interface RequestSender {
  send(path: string, options?: SendOptions): Promise<unknown>
}

export interface HttpClientOptions {
  /**
   * Custom fetch implementation.
   * Useful for environments without native fetch or for adding middleware.
   */
  fetch?: typeof fetch

  /**
   * Default timeout for requests in milliseconds.
   * @default 60000
   */
  timeout?: number

  /** @default 'en-US' */
  lang?: string

  authStore?: AuthStore
}

// ============================================================================
// URL Helpers
// ============================================================================

/**
 * Joins `path` onto `baseUrl` without doubling slashes.
 */
export function buildURL(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl
  if (!path) {
    return base
  }
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`
}

/**
 * Serializes query parameters. `null` and `undefined` are skipped, arrays
 * repeat the key, dates are sent as ISO strings and objects as JSON.
 */
export function serializeQueryParams(params: QueryParams): string {
  const parts: string[] = []
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue
    const values: unknown[] = Array.isArray(value) ? value : [value]
    for (const item of values) {
      if (item === null || item === undefined) continue
      parts.push(`${encodeURIComponent(key)}=${encodeURIComponent(queryValueToString(item))}`)
    }
  }
  return parts.join('&')
}

function queryValueToString(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

// ============================================================================
// HttpClient
// ============================================================================

/**
 * @example
 * ```typescript
 * const http = new HttpClient('https://example.com', { authStore })
 * await http.send('/api/realtime', { method: 'POST', body: { clientId, subscriptions } })
 * ```
 */
export class HttpClient implements RequestSender {
  readonly baseUrl: string
  lang: string
  private readonly _fetch: typeof fetch
  private readonly timeout: number
  private readonly authStore?: AuthStore

  constructor(baseUrl: string, options: HttpClientOptions = {}) {
    this.baseUrl = baseUrl
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis)
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT
    this.lang = options.lang ?? DEFAULT_LANG
    this.authStore = options.authStore
  }

  /**
   * Absolute URL of `path`, with `query` appended when given.
   */
  buildURL(path: string, query?: QueryParams): string {
    const url = buildURL(this.baseUrl, path)
    const serialized = query ? serializeQueryParams(query) : ''
    if (!serialized) {
      return url
    }
    return `${url}${url.includes('?') ? '&' : '?'}${serialized}`
  }

  /**
   * Headers every request carries: language and, when the auth store holds
   * a valid token, `Authorization`.
   */
  defaultHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Accept-Language': this.lang }
    const token = this.authStore?.isValid ? this.authStore.token : ''
    if (token) {
      headers['Authorization'] = token
    }
    return headers
  }

  /**
   * Sends one request and resolves with the decoded JSON body, or null for
   * an empty body.
   *
   * @throws ClientResponseError for HTTP status >= 400, network failures and
   * timeouts
   */
  async send(path: string, options: SendOptions = {}): Promise<unknown> {
    const url = this.buildURL(path, options.query)
    const headers = { ...this.defaultHeaders(), ...options.headers }

    let body: BodyInit | undefined
    if (options.body !== undefined) {
      if (isPlainObject(options.body) || Array.isArray(options.body)) {
        body = JSON.stringify(options.body)
        if (!hasHeader(headers, 'content-type')) {
          headers['Content-Type'] = 'application/json'
        }
      } else if (typeof options.body === 'string') {
        body = options.body
      } else {
        body = JSON.stringify(options.body)
      }
    }

    const controller = new AbortController()
    const timeout = options.timeout ?? this.timeout
    const timeoutId = setTimeout(() => controller.abort(), timeout)
    const onAbort = () => controller.abort()
    if (options.signal?.aborted) {
      controller.abort()
    }
    options.signal?.addEventListener('abort', onAbort)

    let response: Response
    try {
      response = await this._fetch(url, {
        method: options.method ?? 'GET',
        headers,
        body,
        signal: controller.signal,
      })
    } catch (error) {
      const isAbort = controller.signal.aborted
      throw new ClientResponseError(
        isAbort ? `Request to ${path} was aborted` : `Request to ${path} failed`,
        { cause: error, url, isAbort }
      )
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onAbort)
    }

    const data = await readBody(response)
    if (response.status >= 400) {
      const message = isPlainObject(data) && typeof data.message === 'string'
        ? data.message
        : `Request failed with status ${response.status}`
      throw new ClientResponseError(message, {
        url,
        status: response.status,
        response: isPlainObject(data) ? data : {},
      })
    }
    return data
  }
}

async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return null
  }
  const text = await response.text()
  if (!text) {
    return null
  }
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((key) => key.toLowerCase() === name)
}
