import { isValidInstanceId } from '../../types/instance-id.js'
import { InstanceIdReleasedError, InvalidInstanceIdError } from './errors.js'
import { resolveInstanceMetadata } from './metadata.js'

import type { AllocatorState, ApplicationInstanceId, InstanceMetadata } from '../../types/instance-id.js'
import type { MetadataOptions } from './metadata.js'
import type { ApplicationInstanceIdSource } from './source.js'

/**
 * Instance ID pinned by the operator (e.g. INSTANCE_ID set to a StatefulSet ordinal).
 * Nothing is claimed in a store, so there is nothing to release.
 */
export class FixedApplicationInstanceIdSource implements ApplicationInstanceIdSource {
  readonly kind = 'fixed'
  private released = false
  private metadata: InstanceMetadata

  constructor(private id: ApplicationInstanceId, options: MetadataOptions = {}) {
    if (!isValidInstanceId(id)) {
      throw new InvalidInstanceIdError(id)
    }
    this.metadata = resolveInstanceMetadata(options)
  }

  async getInstanceId(): Promise<ApplicationInstanceId> {
    if (this.released) {
      throw new InstanceIdReleasedError(this.id)
    }
    return this.id
  }

  async release(): Promise<void> {
    this.released = true
  }

  getState(): AllocatorState {
    return this.released ? { status: 'released', id: this.id } : { status: 'acquired', id: this.id }
  }

  getMetadata(): InstanceMetadata {
    return this.metadata
  }

  getRaceCount(): number {
    return 0
  }

  dispose(): void {
    // Not subscribed to anything
  }
}
