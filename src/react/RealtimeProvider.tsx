/**
 * RealtimeProvider - React context provider for the realtime client
 *
 * Makes a `Client` available to every descendant through `useRealtimeClient`.
 * Pass an existing `client`, or a `url` (plus `options`) to have the provider
 * create one; a provider-created client is closed on unmount.
 *
 * @module react/RealtimeProvider
 */

import { createContext, useContext, useEffect, useMemo, type ReactNode } from 'react'
import { Client, type FullClientOptions } from '../client/Client'

// ============================================================================
// Constants
// ============================================================================

/**
 * @internal
 */
const MISSING_PROVIDER_ERROR_MESSAGE =
  'useRealtimeClient must be used within a RealtimeProvider. ' +
  'Make sure to wrap your app with <RealtimeProvider url="...">.'

// ============================================================================
// Context
// ============================================================================

const RealtimeContext = createContext<Client | null>(null)

// ============================================================================
// Types
// ============================================================================

export type RealtimeProviderProps =
  | { client: Client; url?: undefined; options?: undefined; children: ReactNode }
  | { client?: undefined; url: string; options?: FullClientOptions; children: ReactNode }

// ============================================================================
// Provider Component
// ============================================================================

/**
 * @example
 * ```tsx
 * function App() {
 *   return (
 *     <RealtimeProvider url="https://example.com">
 *       <Chat />
 *     </RealtimeProvider>
 *   )
 * }
 * ```
 */
export function RealtimeProvider(props: RealtimeProviderProps): ReactNode {
  const { client: external, url, options, children } = props

  const owned = useMemo<Client | null>(
    () => (external ? null : new Client(url ?? '', options)),
    [external, url, options]
  )

  useEffect(() => {
    return () => {
      owned?.close()
    }
  }, [owned])

  const client = external ?? owned

  return (
    <RealtimeContext.Provider value={client}>
      {children}
    </RealtimeContext.Provider>
  )
}

// ============================================================================
// Hook
// ============================================================================

/**
 * Returns the client of the nearest `RealtimeProvider`.
 *
 * @throws {Error} If called outside of a RealtimeProvider
 */
export function useRealtimeClient(): Client {
  const client = useContext(RealtimeContext)
  if (client === null) {
    throw new Error(MISSING_PROVIDER_ERROR_MESSAGE)
  }
  return client
}
