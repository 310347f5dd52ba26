// Application instance ID: an unsigned 16-bit integer, 0 excluded
export type ApplicationInstanceId = number

export const MIN_INSTANCE_ID = 1
export const MAX_INSTANCE_ID = 65535

/**
 * Lifecycle of an allocator within one process.
 * An instance gets exactly one ID: released and failed are terminal.
 * A source released before it acquired anything is released with a null id.
 */
export type AllocatorState =
  | { status: 'unacquired' }
  | { status: 'acquiring' }
  | { status: 'acquired'; id: ApplicationInstanceId }
  | { status: 'released'; id: ApplicationInstanceId | null }
  | { status: 'failed'; error: Error }

// Diagnostic metadata written into each claimed record
export interface InstanceMetadata {
  applicationName: string
  serverName: string
  createdAt: Date
}

export function isValidInstanceId(value: number): value is ApplicationInstanceId {
  return Number.isInteger(value) && value >= MIN_INSTANCE_ID && value <= MAX_INSTANCE_ID
}
