import { describe, it, expect, beforeEach, beforeAll, afterAll } from 'vitest'
import { MongoClient, Db } from 'mongodb'
import { createClient } from 'redis'
import { createObjectStoreRepo } from '../services/object-store/index.js'
import { MemoryObjectStoreRepo } from '../services/object-store/memory-repo.js'
import { MongoObjectStoreRepo } from '../services/object-store/mongo-repo.js'
import { RedisObjectStoreRepo } from '../services/object-store/redis-repo.js'
import { S3ObjectStoreRepo } from '../services/object-store/s3-repo.js'
import { ObjectStoreBackendError } from '../services/instance-id/errors.js'
import type { ObjectStoreRepo } from '../services/object-store/interface.js'
import type { RedisClient } from '../services/redis.js'

const namespace = 'test-instance-ids'

describe('ObjectStoreRepo Factory', () => {
  it('creates a memory repo', () => {
    expect(createObjectStoreRepo({ type: 'memory', namespace })).toBeInstanceOf(MemoryObjectStoreRepo)
  })

  it('creates an s3 repo with the namespace as bucket', () => {
    const repo = createObjectStoreRepo({
      type: 's3',
      namespace,
      s3: { region: 'us-east-1', accessKeyId: 'test-access-key', secretAccessKey: 'test-secret-key' }
    })
    expect(repo).toBeInstanceOf(S3ObjectStoreRepo)
    expect(repo.kind).toBe('s3')
  })

  it('throws error when mongodb type without db', () => {
    expect(() => createObjectStoreRepo({ type: 'mongodb', namespace })).toThrow('MongoDB database instance is required')
  })

  it('throws error when redis type without client', () => {
    expect(() => createObjectStoreRepo({ type: 'redis', namespace })).toThrow('Redis client is required')
  })

  it('throws error when s3 type without configuration', () => {
    expect(() => createObjectStoreRepo({ type: 's3', namespace })).toThrow('S3 configuration is required')
  })
})

/**
 * Contract every backend must satisfy
 */
function describeRepoContract(getRepo: () => ObjectStoreRepo | null, backend: string) {
  it('treats an existing namespace as success', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    await expect(repo.ensureNamespace()).resolves.toBeUndefined()
  })

  it('creates records and lists their names', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    expect(await repo.createRecord('1', 'ApplicationName=a', { overwrite: false })).toEqual({ status: 'created' })
    expect(await repo.createRecord('2', 'ApplicationName=b', { overwrite: false })).toEqual({ status: 'created' })
    expect((await repo.listRecordNames()).sort()).toEqual(['1', '2'])
  })

  it('reports an existing record as a race, not an error', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    await repo.createRecord('1', 'first', { overwrite: false })
    expect(await repo.createRecord('1', 'second', { overwrite: false })).toEqual({ status: 'already-exists' })
  })

  it('overwrites when asked to', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    await repo.createRecord('1', 'first', { overwrite: false })
    expect(await repo.createRecord('1', 'second', { overwrite: true })).toEqual({ status: 'created' })
    expect(await repo.listRecordNames()).toEqual(['1'])
  })

  it('lets exactly one of many concurrent creates win', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    const results = await Promise.all(
      Array.from({ length: 10 }, (_, i) => repo.createRecord('7', `writer-${i}`, { overwrite: false }))
    )
    expect(results.filter(result => result.status === 'created')).toHaveLength(1)
  })

  it('deletes a record and leaves the others', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    await repo.createRecord('1', 'a', { overwrite: false })
    await repo.createRecord('2', 'b', { overwrite: false })
    await repo.deleteRecord('1', { includeDerived: true })
    expect(await repo.listRecordNames()).toEqual(['2'])
  })

  it('fails to delete a missing record', async () => {
    const repo = getRepo()
    if (!repo) {
      console.log(`Skipping test: ${backend} not available`)
      return
    }

    await repo.ensureNamespace()
    await expect(repo.deleteRecord('404', { includeDerived: false })).rejects.toBeInstanceOf(ObjectStoreBackendError)
  })
}

describe('MemoryObjectStoreRepo', () => {
  let repo: MemoryObjectStoreRepo

  beforeEach(() => {
    repo = new MemoryObjectStoreRepo()
  })

  describeRepoContract(() => repo, 'memory')

  it('requires includeDerived to delete a record with snapshots', async () => {
    await repo.createRecord('1', 'a', { overwrite: false })
    repo.snapshot('1')

    await expect(repo.deleteRecord('1', { includeDerived: false })).rejects.toThrow('1 snapshot(s)')
    await repo.deleteRecord('1', { includeDerived: true })
    expect(await repo.listRecordNames()).toEqual([])
  })

  it('keeps the content of the winning create', async () => {
    await repo.createRecord('1', 'first', { overwrite: false })
    await repo.createRecord('1', 'second', { overwrite: false })
    expect(repo.getContent('1')).toBe('first')
  })
})

describe('MongoObjectStoreRepo', () => {
  let mongoClient: MongoClient | null = null
  let db: Db | null = null
  let repo: ObjectStoreRepo | null = null

  beforeAll(async () => {
    if (process.env.MONGODB_URL) {
      try {
        mongoClient = new MongoClient(process.env.MONGODB_URL)
        await mongoClient.connect()
        db = mongoClient.db()
        console.log('Connected to MongoDB for ObjectStoreRepo tests')
      } catch (error) {
        console.warn('MongoDB not available for tests:', error)
      }
    }
  })

  afterAll(async () => {
    if (mongoClient) {
      if (db) {
        await db.collection(namespace).drop().catch((error: unknown) => {
          console.warn('Failed to drop test collection:', error)
        })
      }
      await mongoClient.close()
    }
  })

  beforeEach(async () => {
    if (!db) return

    await db.collection(namespace).deleteMany({})
    repo = createObjectStoreRepo({ type: 'mongodb', namespace, db })
  })

  it('is created by the factory', () => {
    if (!repo) {
      console.log('Skipping test: MongoDB not available')
      return
    }
    expect(repo).toBeInstanceOf(MongoObjectStoreRepo)
  })

  describeRepoContract(() => repo, 'MongoDB')
})

describe('RedisObjectStoreRepo', () => {
  let redisClient: RedisClient | null = null
  let repo: ObjectStoreRepo | null = null

  beforeAll(async () => {
    if (process.env.REDIS_URL) {
      try {
        const client = createClient({ url: process.env.REDIS_URL })
        await client.connect()
        redisClient = client
        console.log('Connected to Redis for ObjectStoreRepo tests')
      } catch (error) {
        console.warn('Redis not available for tests:', error)
      }
    }
  })

  afterAll(async () => {
    if (redisClient) {
      await redisClient.quit()
    }
  })

  beforeEach(async () => {
    if (!redisClient) return

    const keys = await redisClient.keys(`${namespace}:*`)
    if (keys.length > 0) {
      await redisClient.del(keys)
    }
    repo = createObjectStoreRepo({ type: 'redis', namespace, redis: redisClient })
  })

  it('is created by the factory', () => {
    if (!repo) {
      console.log('Skipping test: Redis not available')
      return
    }
    expect(repo).toBeInstanceOf(RedisObjectStoreRepo)
  })

  describeRepoContract(() => repo, 'Redis')
})
