import { serve } from '@hono/node-server'

import { createApp } from './app.js'
import { ConfigError, loadConfig, type AppConfig } from './services/config.js'
import { createApplicationInstanceIdSource } from './services/instance-id/index.js'
import { MongoDBService } from './services/mongodb.js'
import { createObjectStoreRepo, type ObjectStoreRepo } from './services/object-store/index.js'
import { RedisService } from './services/redis.js'
import { ProcessShutdownNotifier } from './services/shutdown-notifier.js'

interface StoreConnection {
  repo: ObjectStoreRepo
  disconnect: () => Promise<void>
}

const noopDisconnect = async () => {}

async function connectObjectStore({ store }: AppConfig): Promise<StoreConnection> {
  switch (store.type) {
    case 'mongodb': {
      console.log('Connecting to MongoDB...')
      const mongoDBService = new MongoDBService(store.mongodbUrl)
      const db = await mongoDBService.connect()
      return {
        repo: createObjectStoreRepo({ type: 'mongodb', namespace: store.namespace, db }),
        disconnect: () => mongoDBService.disconnect()
      }
    }

    case 'redis': {
      console.log('Connecting to Redis...')
      const redisService = new RedisService(store.redisUrl)
      const redis = await redisService.connect()
      return {
        repo: createObjectStoreRepo({ type: 'redis', namespace: store.namespace, redis }),
        disconnect: () => redisService.disconnect()
      }
    }

    case 's3': {
      const { region, endpoint, accessKeyId, secretAccessKey } = store.s3
      if (!accessKeyId || !secretAccessKey) {
        throw new ConfigError('S3 credentials are required for the s3 store')
      }
      return {
        repo: createObjectStoreRepo({
          type: 's3',
          namespace: store.namespace,
          s3: { region, endpoint, accessKeyId, secretAccessKey }
        }),
        disconnect: noopDisconnect
      }
    }

    case 'memory':
      console.warn('INSTANCE_STORE=memory: instance IDs are only unique within this process')
      return {
        repo: createObjectStoreRepo({ type: 'memory', namespace: store.namespace }),
        disconnect: noopDisconnect
      }
  }
}

async function startServer() {
  const config = loadConfig()

  const shutdownNotifier = new ProcessShutdownNotifier({
    onComplete: () => process.exit(0)
  })
  shutdownNotifier.listen()

  const connection = config.instance.fixedInstanceId === undefined ? await connectObjectStore(config) : undefined

  const source = createApplicationInstanceIdSource(config.instance, {
    repo: connection?.repo,
    shutdownNotifier,
    onReleaseError: (error) => {
      console.error('Failed to release application instance ID, its record stays until removed manually:', error)
    }
  })

  let instanceId: number
  try {
    // The instance must own an ID before it serves anything
    instanceId = await source.getInstanceId()
  } catch (error) {
    await connection?.disconnect()
    throw error
  }

  const app = createApp({ source, repo: connection?.repo, adminApiKeys: config.adminApiKeys })

  const server = serve({
    fetch: app.fetch,
    port: config.port
  }, (info) => {
    console.log(`Application instance ID: ${instanceId}`)
    console.log(`Instance ID Allocator is running on http://localhost:${info.port}`)
    console.log(`Admin API: http://localhost:${info.port}/admin/instance`)
  })

  // The source subscribed its release first; stop serving and disconnect after it
  shutdownNotifier.subscribe(() => new Promise<void>((resolve) => {
    server.close(() => resolve())
  }))
  if (connection) {
    shutdownNotifier.subscribe(connection.disconnect)
  }
}

startServer().catch((error) => {
  console.error('Failed to start server:', error)
  process.exit(1)
})
