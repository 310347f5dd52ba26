import type { AllocatorState, ApplicationInstanceId, InstanceMetadata } from '../../types/instance-id.js'

/**
 * Provides this process's application instance ID
 * Implementations: ObjectStoreApplicationInstanceIdSource (allocated), FixedApplicationInstanceIdSource (configured)
 */
export interface ApplicationInstanceIdSource {
  readonly kind: 'allocated' | 'fixed'

  /**
   * Get the instance ID, obtaining it on first use.
   * Every call within the process resolves to the same ID.
   */
  getInstanceId(): Promise<ApplicationInstanceId>

  /**
   * Give the ID back. Never throws; safe to call when nothing was obtained.
   */
  release(): Promise<void>

  getState(): AllocatorState

  /**
   * Metadata written for the claim, once the claim was attempted
   */
  getMetadata(): InstanceMetadata | null

  /**
   * Number of claims lost to concurrently starting instances
   */
  getRaceCount(): number

  /**
   * Detach from the shutdown notifier without releasing
   */
  dispose(): void
}
