import { Hono } from 'hono'
import { logger } from 'hono/logger'

import { createAdminAuth } from './middleware/auth.js'
import { createAdminRoutes, describeState } from './routes/admin.js'

import type { ApplicationInstanceIdSource } from './services/instance-id/source.js'
import type { ObjectStoreRepo } from './services/object-store/interface.js'

export interface AppDependencies {
  source: ApplicationInstanceIdSource
  repo?: ObjectStoreRepo
  adminApiKeys: string[]
  /** Log each request (off in tests) */
  requestLogging?: boolean
}

export function createApp({ source, repo, adminApiKeys, requestLogging = true }: AppDependencies) {
  const app = new Hono()

  if (requestLogging) {
    app.use('*', logger())
  }

  // Health check endpoint
  app.get('/health', (c) => {
    const state = describeState(source.getState())
    return c.json({
      service: 'Instance ID Allocator',
      status: state.status === 'acquired' ? 'running' : 'degraded',
      version: '1.0.0',
      instanceId: state.instanceId,
      allocator: state.status
    }, state.status === 'acquired' ? 200 : 503)
  })

  app.use('/admin/*', createAdminAuth(adminApiKeys))
  app.route('/admin', createAdminRoutes({ source, repo }))

  return app
}
