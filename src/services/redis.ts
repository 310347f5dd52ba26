import { createClient } from 'redis'

export type RedisClient = ReturnType<typeof createClient>

export class RedisService {
  private client: RedisClient | null = null

  constructor(private url: string = process.env.REDIS_URL || 'redis://localhost:6379') {}

  async connect(): Promise<RedisClient> {
    try {
      const client = createClient({ url: this.url })
      client.on('error', (error) => {
        console.error('Redis client error:', error)
      })
      await client.connect()
      this.client = client
      console.log('Connected to Redis')
      return client
    } catch (error) {
      console.error('Failed to connect to Redis:', error)
      throw error
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit()
      this.client = null
      console.log('Disconnected from Redis')
    }
  }
}
