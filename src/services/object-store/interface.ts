/**
 * Result of a conditional create.
 * `already-exists` means another instance claimed the name first; it is a race, not an error.
 */
export type CreateRecordResult = { status: 'created' } | { status: 'already-exists' }

export interface CreateRecordOptions {
  /** Replace an existing record instead of reporting `already-exists` */
  overwrite: boolean
}

export interface DeleteRecordOptions {
  /** Also delete artifacts the backend keeps for the record (snapshots, object versions) */
  includeDerived: boolean
}

/**
 * Object store repo interface
 * The minimal capability the instance ID allocator needs from a shared store.
 * Implementations must be safe for concurrent use by many processes against the same namespace.
 * Currently supports: in-memory, MongoDB, Redis, S3
 */
export interface ObjectStoreRepo {
  /**
   * Backend identifier, for diagnostics
   */
  readonly kind: string

  /**
   * Create the namespace if it does not exist yet.
   * An existing namespace is success; any other outcome throws ObjectStoreBackendError.
   */
  ensureNamespace(): Promise<void>

  /**
   * List every record name in the namespace.
   * No ordering is guaranteed.
   */
  listRecordNames(): Promise<string[]>

  /**
   * Write a record.
   * @returns `already-exists` when overwrite is false and the name is taken
   */
  createRecord(name: string, content: string, options: CreateRecordOptions): Promise<CreateRecordResult>

  /**
   * Delete a record. A missing record or unexpected response throws ObjectStoreBackendError.
   */
  deleteRecord(name: string, options: DeleteRecordOptions): Promise<void>
}

export const CREATED: CreateRecordResult = { status: 'created' }
export const ALREADY_EXISTS: CreateRecordResult = { status: 'already-exists' }
