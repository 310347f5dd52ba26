import { MAX_INSTANCE_ID } from '../../types/instance-id.js'

export type InstanceIdErrorCode =
  | 'NAMESPACE_CORRUPTED'
  | 'ID_SPACE_EXHAUSTED'
  | 'BACKEND_FAULT'
  | 'INSTANCE_ID_RELEASED'
  | 'INVALID_INSTANCE_ID'

/**
 * Base class for every failure raised while obtaining or releasing an instance ID.
 * The code lets operators tell manual cleanup, capacity and store outages apart.
 */
export class InstanceIdError extends Error {
  constructor(
    message: string,
    public readonly code: InstanceIdErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'InstanceIdError'
  }
}

/**
 * The namespace holds a record whose name is not a canonical instance ID.
 */
export class NamespaceCorruptionError extends InstanceIdError {
  constructor(public readonly recordName: string) {
    super(
      `Encountered unrelated record "${recordName}" in the instance ID namespace`,
      'NAMESPACE_CORRUPTED'
    )
    this.name = 'NamespaceCorruptionError'
  }
}

export class IdSpaceExhaustedError extends InstanceIdError {
  constructor() {
    super(`All application instance IDs up to ${MAX_INSTANCE_ID} are claimed`, 'ID_SPACE_EXHAUSTED')
    this.name = 'IdSpaceExhaustedError'
  }
}

export type ObjectStoreOperation = 'ensureNamespace' | 'listRecordNames' | 'createRecord' | 'deleteRecord'

/**
 * Unexpected response from the object store.
 * `status` is the HTTP status or driver error code when the backend reported one.
 */
export class ObjectStoreBackendError extends InstanceIdError {
  constructor(
    message: string,
    public readonly operation: ObjectStoreOperation,
    public readonly status?: number | string,
    options?: { cause?: unknown }
  ) {
    super(message, 'BACKEND_FAULT', options)
    this.name = 'ObjectStoreBackendError'
  }
}

export class InstanceIdReleasedError extends InstanceIdError {
  constructor(id: number | null = null) {
    super(
      id === null
        ? 'The application instance ID source has already been released'
        : `Application instance ID ${id} has already been released`,
      'INSTANCE_ID_RELEASED'
    )
    this.name = 'InstanceIdReleasedError'
  }
}

export class InvalidInstanceIdError extends InstanceIdError {
  constructor(value: string | number) {
    super(`Invalid application instance ID: ${value}`, 'INVALID_INSTANCE_ID')
    this.name = 'InvalidInstanceIdError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
