import { ObjectStoreApplicationInstanceIdSource } from './allocator.js'
import { FixedApplicationInstanceIdSource } from './fixed-source.js'

import type { ObjectStoreRepo } from '../object-store/interface.js'
import type { ShutdownNotifier } from '../shutdown-notifier.js'
import type { ApplicationInstanceIdSource } from './source.js'

export * from './errors.js'
export * from './source.js'
export { ObjectStoreApplicationInstanceIdSource } from './allocator.js'
export { FixedApplicationInstanceIdSource } from './fixed-source.js'
export { findSmallestFreeId, parseRecordName, formatRecordName } from './gap-scan.js'
export { formatRecordContent, resolveInstanceMetadata } from './metadata.js'

export interface InstanceIdSourceConfig {
  fixedInstanceId?: number
  applicationName?: string
  serverName?: string
}

export interface InstanceIdSourceDependencies {
  repo?: ObjectStoreRepo
  shutdownNotifier?: ShutdownNotifier
  onReleaseError?: (error: unknown) => void
}

/**
 * Factory function to create the instance ID source
 * @returns a fixed source when an ID is configured, otherwise an allocator over the object store
 */
export function createApplicationInstanceIdSource(
  config: InstanceIdSourceConfig,
  deps: InstanceIdSourceDependencies
): ApplicationInstanceIdSource {
  const metadataOptions = { applicationName: config.applicationName, serverName: config.serverName }

  if (config.fixedInstanceId !== undefined) {
    console.log(`Using fixed application instance ID ${config.fixedInstanceId}`)
    return new FixedApplicationInstanceIdSource(config.fixedInstanceId, metadataOptions)
  }

  if (!deps.repo) {
    throw new Error('An object store repo is required to allocate application instance IDs')
  }

  return new ObjectStoreApplicationInstanceIdSource(deps.repo, {
    ...metadataOptions,
    shutdownNotifier: deps.shutdownNotifier,
    onReleaseError: deps.onReleaseError
  })
}
