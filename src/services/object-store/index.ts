import type { Db } from 'mongodb'
import type { RedisClient } from '../redis.js'
import type { ObjectStoreRepo } from './interface.js'
import { MemoryObjectStoreRepo } from './memory-repo.js'
import { MongoObjectStoreRepo } from './mongo-repo.js'
import { RedisObjectStoreRepo } from './redis-repo.js'
import { S3ObjectStoreRepo, type S3RepoConfig } from './s3-repo.js'

export * from './interface.js'

/**
 * Object store type
 */
export type ObjectStoreType = 'memory' | 'mongodb' | 'redis' | 's3'

/**
 * Configuration for creating an object store repo
 */
export interface ObjectStoreRepoConfig {
  type: ObjectStoreType
  namespace: string

  // MongoDB options
  db?: Db

  // Redis options
  redis?: RedisClient

  // S3 options (the namespace is the bucket)
  s3?: Omit<S3RepoConfig, 'bucket'>
}

/**
 * Create an object store repo based on configuration
 */
export function createObjectStoreRepo(config: ObjectStoreRepoConfig): ObjectStoreRepo {
  switch (config.type) {
    case 'memory':
      return new MemoryObjectStoreRepo()

    case 'mongodb':
      if (!config.db) {
        throw new Error('MongoDB database instance is required for mongodb store type')
      }
      return new MongoObjectStoreRepo(config.db, config.namespace)

    case 'redis':
      if (!config.redis) {
        throw new Error('Redis client is required for redis store type')
      }
      return new RedisObjectStoreRepo(config.redis, config.namespace)

    case 's3':
      if (!config.s3) {
        throw new Error('S3 configuration is required for s3 store type')
      }
      return new S3ObjectStoreRepo({ ...config.s3, bucket: config.namespace })

    default:
      throw new Error(`Unknown object store type: ${String(config.type)}`)
  }
}
