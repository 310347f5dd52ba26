import { MongoClient } from 'mongodb'

import type { Db } from 'mongodb'

export class MongoDBService {
  private client: MongoClient | null = null

  constructor(private url: string = process.env.MONGODB_URL || 'mongodb://localhost:27017/instance-ids') {}

  async connect(): Promise<Db> {
    try {
      const client = new MongoClient(this.url)
      await client.connect()
      this.client = client
      console.log('Connected to MongoDB')
      return client.db()
    } catch (error) {
      console.error('Failed to connect to MongoDB:', error)
      throw error
    }
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close()
      this.client = null
      console.log('Disconnected from MongoDB')
    }
  }
}
