import { ObjectStoreBackendError } from '../instance-id/errors.js'
import { ALREADY_EXISTS, CREATED } from './interface.js'

import type { CreateRecordOptions, CreateRecordResult, DeleteRecordOptions, ObjectStoreRepo } from './interface.js'

interface MemoryRecord {
  content: string
  snapshots: string[]
}

/**
 * In-memory object store repo
 *
 * Shares one namespace between every allocator holding the same instance, which makes it
 * the stand-in for a real store in tests and in single-process development.
 * Snapshots behave like blob snapshots: a record that has them can only be deleted
 * together with them.
 */
export class MemoryObjectStoreRepo implements ObjectStoreRepo {
  readonly kind = 'memory'
  private records: Map<string, MemoryRecord> = new Map()
  private namespaceExists = false

  constructor(initialRecordNames: Iterable<string> = []) {
    for (const name of initialRecordNames) {
      this.records.set(name, { content: '', snapshots: [] })
    }
  }

  async ensureNamespace(): Promise<void> {
    this.namespaceExists = true
  }

  async listRecordNames(): Promise<string[]> {
    return [...this.records.keys()]
  }

  async createRecord(name: string, content: string, options: CreateRecordOptions): Promise<CreateRecordResult> {
    const existing = this.records.get(name)
    if (existing && !options.overwrite) {
      return ALREADY_EXISTS
    }
    this.records.set(name, { content, snapshots: existing?.snapshots ?? [] })
    return CREATED
  }

  async deleteRecord(name: string, options: DeleteRecordOptions): Promise<void> {
    const record = this.records.get(name)
    if (!record) {
      throw new ObjectStoreBackendError(`Record ${name} does not exist`, 'deleteRecord', 404)
    }
    if (record.snapshots.length > 0 && !options.includeDerived) {
      throw new ObjectStoreBackendError(
        `Record ${name} has ${record.snapshots.length} snapshot(s) and cannot be deleted without them`,
        'deleteRecord',
        409
      )
    }
    this.records.delete(name)
  }

  /**
   * Snapshot the current content of a record
   */
  snapshot(name: string): void {
    const record = this.records.get(name)
    if (!record) {
      throw new Error(`Record ${name} does not exist`)
    }
    record.snapshots.push(record.content)
  }

  getContent(name: string): string | undefined {
    return this.records.get(name)?.content
  }

  hasNamespace(): boolean {
    return this.namespaceExists
  }
}
