import { envSchema } from '../schemas/config.js'

import type { ObjectStoreType } from './object-store/index.js'

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message)
    this.name = 'ConfigError'
  }
}

export interface AppConfig {
  port: number
  store: {
    type: ObjectStoreType
    namespace: string
    mongodbUrl?: string
    redisUrl?: string
    s3: {
      region: string
      endpoint?: string
      accessKeyId?: string
      secretAccessKey?: string
    }
  }
  instance: {
    fixedInstanceId?: number
    applicationName?: string
    serverName?: string
  }
  adminApiKeys: string[]
}

/**
 * Load and validate configuration from environment variables
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues)
  }

  const parsed = result.data
  return {
    port: parsed.PORT,
    store: {
      type: parsed.INSTANCE_STORE,
      namespace: parsed.INSTANCE_NAMESPACE,
      mongodbUrl: parsed.MONGODB_URL,
      redisUrl: parsed.REDIS_URL,
      s3: {
        region: parsed.S3_REGION,
        endpoint: parsed.S3_ENDPOINT,
        accessKeyId: parsed.S3_ACCESS_KEY_ID,
        secretAccessKey: parsed.S3_SECRET_ACCESS_KEY
      }
    },
    instance: {
      fixedInstanceId: parsed.INSTANCE_ID,
      applicationName: parsed.APP_NAME,
      serverName: parsed.SERVER_NAME
    },
    adminApiKeys: parseApiKeys(parsed.ADMIN_APIKEYS)
  }
}

export function parseApiKeys(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0)
}
