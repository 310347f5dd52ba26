import { ObjectStoreBackendError, describeError } from '../instance-id/errors.js'
import { ALREADY_EXISTS, CREATED } from './interface.js'

import type { RedisClient } from '../redis.js'
import type { CreateRecordOptions, CreateRecordResult, DeleteRecordOptions, ObjectStoreRepo } from './interface.js'

/**
 * Redis-based object store repo
 *
 * Data structure:
 *   - {namespace}:{recordName} -> String (record content)
 *
 * SET NX is the conditional create. Keys carry no derived artifacts,
 * so `includeDerived` has nothing extra to remove.
 */
export class RedisObjectStoreRepo implements ObjectStoreRepo {
  readonly kind = 'redis'
  private prefix: string

  constructor(private redis: RedisClient, namespace: string) {
    this.prefix = `${namespace}:`
  }

  async ensureNamespace(): Promise<void> {
    // Key prefixes need no creation; only check that the server answers
    let reply: string
    try {
      reply = await this.redis.ping()
    } catch (error) {
      throw new ObjectStoreBackendError(`Failed to reach Redis: ${describeError(error)}`, 'ensureNamespace', undefined, {
        cause: error
      })
    }
    if (reply !== 'PONG') {
      throw new ObjectStoreBackendError(`Unexpected PING reply from Redis: ${reply}`, 'ensureNamespace')
    }
    console.log(`✓ RedisObjectStoreRepo ready (prefix ${this.prefix})`)
  }

  async listRecordNames(): Promise<string[]> {
    const names: string[] = []
    try {
      for await (const key of this.redis.scanIterator({ MATCH: `${this.escapeGlob(this.prefix)}*`, COUNT: 500 })) {
        names.push(key.slice(this.prefix.length))
      }
    } catch (error) {
      throw new ObjectStoreBackendError(`Failed to scan Redis keys: ${describeError(error)}`, 'listRecordNames', undefined, {
        cause: error
      })
    }
    return names
  }

  async createRecord(name: string, content: string, options: CreateRecordOptions): Promise<CreateRecordResult> {
    const key = this.prefix + name
    let reply: string | null
    try {
      reply = options.overwrite
        ? await this.redis.set(key, content)
        : await this.redis.set(key, content, { NX: true })
    } catch (error) {
      throw new ObjectStoreBackendError(`Failed to create record ${name}: ${describeError(error)}`, 'createRecord', undefined, {
        cause: error
      })
    }

    if (reply === 'OK') {
      return CREATED
    }
    if (reply === null && !options.overwrite) {
      return ALREADY_EXISTS
    }
    throw new ObjectStoreBackendError(`Unexpected SET reply for record ${name}: ${reply}`, 'createRecord')
  }

  async deleteRecord(name: string, _options: DeleteRecordOptions): Promise<void> {
    let deleted: number
    try {
      deleted = await this.redis.del(this.prefix + name)
    } catch (error) {
      throw new ObjectStoreBackendError(`Failed to delete record ${name}: ${describeError(error)}`, 'deleteRecord', undefined, {
        cause: error
      })
    }
    if (deleted !== 1) {
      throw new ObjectStoreBackendError(`Record ${name} does not exist`, 'deleteRecord', 404)
    }
  }

  private escapeGlob(value: string): string {
    return value.replace(/[*?[\]\\]/g, '\\$&')
  }
}
