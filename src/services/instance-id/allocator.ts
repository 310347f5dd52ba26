import { InstanceIdError, InstanceIdReleasedError, ObjectStoreBackendError, describeError } from './errors.js'
import { findSmallestFreeId, formatRecordName } from './gap-scan.js'
import { formatRecordContent, resolveInstanceMetadata } from './metadata.js'

import type { AllocatorState, ApplicationInstanceId, InstanceMetadata } from '../../types/instance-id.js'
import type { ObjectStoreRepo } from '../object-store/interface.js'
import type { ShutdownNotifier, Unsubscribe } from '../shutdown-notifier.js'
import type { ObjectStoreOperation } from './errors.js'
import type { MetadataOptions } from './metadata.js'
import type { ApplicationInstanceIdSource } from './source.js'

export interface ObjectStoreInstanceIdSourceOptions extends MetadataOptions {
  /** Release is subscribed here at construction */
  shutdownNotifier?: ShutdownNotifier
  /** Receives failures of the best-effort release */
  onReleaseError?: (error: unknown) => void
  clock?: () => Date
}

/**
 * Allocates the application instance ID through a shared object store.
 *
 * Claims the smallest ID without a record by creating that record, non-overwriting.
 * Losing the create to another instance restarts the scan from a fresh listing.
 * On shutdown the record is deleted again; a failed delete only leaks the slot,
 * which a later allocation reuses once it is freed.
 */
export class ObjectStoreApplicationInstanceIdSource implements ApplicationInstanceIdSource {
  readonly kind = 'allocated'
  private state: AllocatorState = { status: 'unacquired' }
  private inFlight: Promise<ApplicationInstanceId> | null = null
  private releasePromise: Promise<void> | null = null
  private unsubscribeShutdown: Unsubscribe | null = null
  private metadata: InstanceMetadata | null = null
  private raceCount = 0
  private clock: () => Date

  constructor(
    private repo: ObjectStoreRepo,
    private options: ObjectStoreInstanceIdSourceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date())
    if (options.shutdownNotifier) {
      this.unsubscribeShutdown = options.shutdownNotifier.subscribe(() => this.release())
    }
  }

  async getInstanceId(): Promise<ApplicationInstanceId> {
    switch (this.state.status) {
      case 'acquired':
        return this.state.id
      case 'released':
        throw new InstanceIdReleasedError(this.state.id)
      case 'failed':
        throw this.state.error
    }

    if (this.inFlight) {
      return this.inFlight
    }
    if (this.releasePromise) {
      throw new InstanceIdReleasedError()
    }

    this.state = { status: 'acquiring' }
    this.inFlight = this.acquire().then(
      (id) => {
        this.state = { status: 'acquired', id }
        this.inFlight = null
        console.log(`[InstanceIdAllocator] Acquired application instance ID ${id} from ${this.repo.kind} store`)
        return id
      },
      (error: unknown) => {
        const failure = this.toInstanceIdError(error, 'createRecord')
        this.state = { status: 'failed', error: failure }
        this.inFlight = null
        console.error(`[InstanceIdAllocator] Failed to acquire application instance ID: ${failure.message}`)
        throw failure
      }
    )
    return this.inFlight
  }

  release(): Promise<void> {
    if (!this.releasePromise) {
      this.releasePromise = this.releaseOnce()
    }
    return this.releasePromise
  }

  getState(): AllocatorState {
    return this.state
  }

  getMetadata(): InstanceMetadata | null {
    return this.metadata
  }

  getRaceCount(): number {
    return this.raceCount
  }

  dispose(): void {
    if (this.unsubscribeShutdown) {
      this.unsubscribeShutdown()
      this.unsubscribeShutdown = null
    }
  }

  private async acquire(): Promise<ApplicationInstanceId> {
    const metadata = resolveInstanceMetadata(this.options, this.clock())
    this.metadata = metadata
    const content = formatRecordContent(metadata)

    await this.callStore('ensureNamespace', () => this.repo.ensureNamespace())

    while (true) {
      const recordNames = await this.callStore('listRecordNames', () => this.repo.listRecordNames())
      const candidate = findSmallestFreeId(recordNames)

      const result = await this.callStore('createRecord', () =>
        this.repo.createRecord(formatRecordName(candidate), content, { overwrite: false })
      )
      if (result.status === 'created') {
        return candidate
      }

      this.raceCount++
      console.debug(`[InstanceIdAllocator] Instance ID ${candidate} was claimed concurrently, retrying`)
    }
  }

  private async releaseOnce(): Promise<void> {
    this.dispose()

    if (this.inFlight) {
      // An acquisition failure was already reported to its caller
      await Promise.allSettled([this.inFlight])
    }
    if (this.state.status === 'unacquired') {
      this.state = { status: 'released', id: null }
      return
    }
    if (this.state.status !== 'acquired') {
      return
    }

    const id = this.state.id
    this.state = { status: 'released', id }

    try {
      await this.repo.deleteRecord(formatRecordName(id), { includeDerived: true })
      console.log(`[InstanceIdAllocator] Released application instance ID ${id}`)
    } catch (error) {
      this.reportReleaseError(error)
    }
  }

  private reportReleaseError(error: unknown): void {
    if (!this.options.onReleaseError) {
      console.warn(`[InstanceIdAllocator] Failed to release application instance ID: ${describeError(error)}`)
      return
    }
    try {
      this.options.onReleaseError(error)
    } catch (handlerError) {
      console.error('[InstanceIdAllocator] Release error handler failed:', handlerError)
    }
  }

  private async callStore<T>(operation: ObjectStoreOperation, call: () => Promise<T>): Promise<T> {
    try {
      return await call()
    } catch (error) {
      throw this.toInstanceIdError(error, operation)
    }
  }

  private toInstanceIdError(error: unknown, operation: ObjectStoreOperation): InstanceIdError {
    if (error instanceof InstanceIdError) {
      return error
    }
    return new ObjectStoreBackendError(
      `Object store ${operation} failed: ${describeError(error)}`,
      operation,
      undefined,
      { cause: error }
    )
  }
}
