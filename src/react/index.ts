/**
 * React bindings
 */

export { RealtimeProvider, useRealtimeClient } from './RealtimeProvider'
export type { RealtimeProviderProps } from './RealtimeProvider'
export { useTopic } from './useTopic'
export { useRecordSubscription } from './useRecordSubscription'

// Re-export client for convenience
export { Client } from '../client/Client'
