/**
 * Auth Store
 *
 * Holds the current auth token and the authenticated record. Both realtime
 * channels read the token when they open a transport, so a token saved
 * here is picked up by the next (re)connection.
 */

import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

/**
 * Standard JWT claims.
 */
export interface TokenClaims {
  /** Subject - typically user ID */
  sub?: string
  /** Expiration time (Unix timestamp in seconds) */
  exp?: number
  /** Issued at (Unix timestamp in seconds) */
  iat?: number
  /** Allow additional custom claims */
  [key: string]: unknown
}

/**
 * The authenticated record (user or admin) as returned by the server.
 */
export interface AuthRecord {
  id?: string
  [key: string]: unknown
}

export type AuthChangeCallback = (token: string, record: AuthRecord | null) => void

/**
 * Key/value persistence, e.g. `localStorage`.
 */
export interface TokenStorage {
  getItem(key: string): string | null
  setItem(key: string, value: string): void
  removeItem(key: string): void
}

export interface AuthStoreOptions {
  storage?: TokenStorage
  /** @default 'tidewire_auth' */
  storageKey?: string
}

// ============================================================================
// JWT Utility Functions
// ============================================================================

/**
 * Decode base64url to string.
 */
function base64UrlDecode(input: string): string {
  let base64 = input.replace(/-/g, '+').replace(/_/g, '/')

  const pad = base64.length % 4
  if (pad) {
    base64 += '='.repeat(4 - pad)
  }

  try {
    return atob(base64)
  } catch (error) {
    throw new ValidationError('Invalid base64 encoding in token', { field: 'token', cause: error })
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toAuthRecord(value: Record<string, unknown>): AuthRecord {
  const { id, ...rest } = value
  return { ...rest, id: typeof id === 'string' ? id : undefined }
}

/**
 * Parse a JWT token and extract its claims.
 *
 * @throws ValidationError when the token is malformed
 */
export function parseJWT(token: string): TokenClaims {
  const parts = token.split('.')
  if (parts.length !== 3 || !parts[1]) {
    throw new ValidationError('Token must have three parts separated by dots', { field: 'token' })
  }

  let payload: unknown
  try {
    payload = JSON.parse(base64UrlDecode(parts[1]))
  } catch (error) {
    if (error instanceof ValidationError) throw error
    throw new ValidationError('Token payload is not valid JSON', { field: 'token', cause: error })
  }

  if (!isRecord(payload)) {
    throw new ValidationError('Token payload must be an object', { field: 'token' })
  }
  const { exp, iat, sub } = payload
  return {
    ...payload,
    exp: typeof exp === 'number' ? exp : undefined,
    iat: typeof iat === 'number' ? iat : undefined,
    sub: typeof sub === 'string' ? sub : undefined,
  }
}

/**
 * Check if a token is expired.
 *
 * @param bufferSeconds - treat the token as expired this many seconds early
 * @returns true if the token is expired or cannot be parsed
 */
export function isTokenExpired(token: string, bufferSeconds: number = 0): boolean {
  try {
    const claims = parseJWT(token)
    if (claims.exp === undefined) {
      return false
    }
    const now = Math.floor(Date.now() / 1000)
    return claims.exp <= now + bufferSeconds
  } catch {
    return true
  }
}

// ============================================================================
// AuthStore
// ============================================================================

/**
 * @example
 * ```typescript
 * const authStore = new AuthStore()
 * authStore.onChange((token, record) => {
 *   console.log('signed in as', record?.id)
 * })
 * authStore.save(token, record)
 * ```
 */
export class AuthStore {
  private _token = ''
  private _record: AuthRecord | null = null
  private readonly storage: TokenStorage | null
  private readonly storageKey: string
  private readonly callbacks = new Set<AuthChangeCallback>()

  constructor(options: AuthStoreOptions = {}) {
    this.storage = options.storage ?? null
    this.storageKey = options.storageKey ?? 'tidewire_auth'
    this.restoreFromStorage()
  }

  get token(): string {
    return this._token
  }

  get record(): AuthRecord | null {
    return this._record
  }

  /**
   * Whether a token is held and has not expired.
   */
  get isValid(): boolean {
    return this._token !== '' && !isTokenExpired(this._token)
  }

  save(token: string, record: AuthRecord | null = null): void {
    this._token = token
    this._record = record
    this.storage?.setItem(this.storageKey, JSON.stringify({ token, record }))
    this.emitChange()
  }

  clear(): void {
    this._token = ''
    this._record = null
    this.storage?.removeItem(this.storageKey)
    this.emitChange()
  }

  /**
   * Register a callback for token changes.
   *
   * @returns Unsubscribe function
   */
  onChange(callback: AuthChangeCallback, fireImmediately = false): () => void {
    this.callbacks.add(callback)
    if (fireImmediately) {
      callback(this._token, this._record)
    }
    return () => {
      this.callbacks.delete(callback)
    }
  }

  private emitChange(): void {
    for (const callback of Array.from(this.callbacks)) {
      callback(this._token, this._record)
    }
  }

  private restoreFromStorage(): void {
    const raw = this.storage?.getItem(this.storageKey)
    if (!raw) {
      return
    }

    let stored: unknown
    try {
      stored = JSON.parse(raw)
    } catch {
      this.storage?.removeItem(this.storageKey)
      return
    }

    if (!isRecord(stored) || typeof stored.token !== 'string') {
      this.storage?.removeItem(this.storageKey)
      return
    }
    this._token = stored.token
    this._record = isRecord(stored.record) ? toAuthRecord(stored.record) : null
  }
}
