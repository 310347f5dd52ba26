/**
 * Test helpers: in-process stand-ins for a shared object store
 */

import { MemoryObjectStoreRepo } from '../services/object-store/memory-repo.js'

/**
 * Record names "from".."to" inclusive
 */
export function recordNames(from: number, to: number): string[] {
  const names: string[] = []
  for (let id = from; id <= to; id++) {
    names.push(String(id))
  }
  return names
}

/**
 * Returns an outdated listing on the first call, as if another instance
 * claimed an ID between our listing and our create.
 */
export class StaleListingRepo extends MemoryObjectStoreRepo {
  private staleListings: string[][]

  constructor(initialRecordNames: string[], ...staleListings: string[][]) {
    super(initialRecordNames)
    this.staleListings = staleListings
  }

  async listRecordNames(): Promise<string[]> {
    const stale = this.staleListings.shift()
    return stale ?? super.listRecordNames()
  }
}

/**
 * Holds the first `parties` listings until all of them arrived, so every caller
 * sees the same snapshot and picks the same candidate.
 */
export class BarrierListingRepo extends MemoryObjectStoreRepo {
  private waiting = 0
  private release: (() => void) | null = null
  private barrier: Promise<void>

  constructor(private parties: number, initialRecordNames: string[] = []) {
    super(initialRecordNames)
    this.barrier = new Promise<void>((resolve) => {
      this.release = resolve
    })
  }

  async listRecordNames(): Promise<string[]> {
    const snapshot = await super.listRecordNames()
    if (this.waiting < this.parties) {
      this.waiting++
      if (this.waiting === this.parties) {
        this.release?.()
      }
      await this.barrier
    }
    return snapshot
  }
}
