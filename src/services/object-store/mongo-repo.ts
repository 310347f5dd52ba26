import { MongoServerError } from 'mongodb'

import { ObjectStoreBackendError, describeError } from '../instance-id/errors.js'
import { ALREADY_EXISTS, CREATED } from './interface.js'

import type { Collection, Db } from 'mongodb'
import type { CreateRecordOptions, CreateRecordResult, DeleteRecordOptions, ObjectStoreRepo } from './interface.js'

/**
 * MongoDB document for a claimed record
 */
interface RecordDocument {
  _id: string // record name
  content: string
  createdAt: Date
}

const NAMESPACE_EXISTS_CODE = 48
const DUPLICATE_KEY_CODE = 11000

/**
 * MongoDB-based object store repo
 * One collection is the namespace; the `_id` unique index provides the conditional create.
 * Documents have no derived artifacts, so `includeDerived` has nothing extra to remove.
 */
export class MongoObjectStoreRepo implements ObjectStoreRepo {
  readonly kind = 'mongodb'
  private collection: Collection<RecordDocument>

  constructor(private db: Db, private collectionName: string) {
    this.collection = db.collection<RecordDocument>(collectionName)
  }

  async ensureNamespace(): Promise<void> {
    try {
      await this.db.createCollection(this.collectionName)
      console.log(`✓ MongoObjectStoreRepo created collection ${this.collectionName}`)
    } catch (error) {
      if (error instanceof MongoServerError && error.code === NAMESPACE_EXISTS_CODE) {
        return
      }
      throw new ObjectStoreBackendError(
        `Failed to ensure collection ${this.collectionName} exists: ${describeError(error)}`,
        'ensureNamespace',
        error instanceof MongoServerError ? error.code : undefined,
        { cause: error }
      )
    }
  }

  async listRecordNames(): Promise<string[]> {
    try {
      const docs = await this.collection.find({}, { projection: { _id: 1 } }).toArray()
      return docs.map(doc => doc._id)
    } catch (error) {
      throw new ObjectStoreBackendError(
        `Failed to list records in ${this.collectionName}: ${describeError(error)}`,
        'listRecordNames',
        error instanceof MongoServerError ? error.code : undefined,
        { cause: error }
      )
    }
  }

  async createRecord(name: string, content: string, options: CreateRecordOptions): Promise<CreateRecordResult> {
    const doc: RecordDocument = { _id: name, content, createdAt: new Date() }

    try {
      if (options.overwrite) {
        await this.collection.replaceOne({ _id: name }, doc, { upsert: true })
      } else {
        await this.collection.insertOne(doc)
      }
      return CREATED
    } catch (error) {
      if (!options.overwrite && error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE) {
        return ALREADY_EXISTS
      }
      throw new ObjectStoreBackendError(
        `Failed to create record ${name}: ${describeError(error)}`,
        'createRecord',
        error instanceof MongoServerError ? error.code : undefined,
        { cause: error }
      )
    }
  }

  async deleteRecord(name: string, _options: DeleteRecordOptions): Promise<void> {
    let deletedCount: number
    try {
      const result = await this.collection.deleteOne({ _id: name })
      deletedCount = result.deletedCount
    } catch (error) {
      throw new ObjectStoreBackendError(
        `Failed to delete record ${name}: ${describeError(error)}`,
        'deleteRecord',
        error instanceof MongoServerError ? error.code : undefined,
        { cause: error }
      )
    }

    if (deletedCount !== 1) {
      throw new ObjectStoreBackendError(`Record ${name} does not exist`, 'deleteRecord', 404)
    }
  }
}
