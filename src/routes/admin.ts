import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'

import { claimsQuerySchema } from '../schemas/config.js'
import { InstanceIdError, describeError } from '../services/instance-id/errors.js'
import { parseRecordName } from '../services/instance-id/gap-scan.js'

import type { ObjectStoreRepo } from '../services/object-store/interface.js'
import type { ApplicationInstanceIdSource } from '../services/instance-id/source.js'
import type { AllocatorState } from '../types/instance-id.js'

export interface AdminRouteDependencies {
  source: ApplicationInstanceIdSource
  repo?: ObjectStoreRepo
}

export function describeState(state: AllocatorState) {
  switch (state.status) {
    case 'acquired':
    case 'released':
      return { status: state.status, instanceId: state.id }
    case 'failed':
      return {
        status: state.status,
        instanceId: null,
        error: state.error.message,
        code: state.error instanceof InstanceIdError ? state.error.code : null
      }
    default:
      return { status: state.status, instanceId: null }
  }
}

export function createAdminRoutes({ source, repo }: AdminRouteDependencies) {
  const admin = new Hono()

  // GET /admin/instance - This process's instance ID and how it was obtained
  admin.get('/instance', (c) => {
    const metadata = source.getMetadata()
    return c.json({
      ...describeState(source.getState()),
      source: source.kind,
      store: repo?.kind ?? null,
      metadata: metadata
        ? {
            applicationName: metadata.applicationName,
            serverName: metadata.serverName,
            createdAt: metadata.createdAt.toISOString()
          }
        : null,
      raceCount: source.getRaceCount()
    })
  })

  // GET /admin/claims - IDs currently claimed in the shared namespace
  admin.get(
    '/claims',
    zValidator('query', claimsQuerySchema),
    async (c) => {
      if (!repo) {
        return c.json({ error: 'No object store configured for this instance' }, 503)
      }

      const { limit, offset } = c.req.valid('query')

      let recordNames: string[]
      try {
        recordNames = await repo.listRecordNames()
      } catch (error) {
        console.error('[Admin] Failed to list claimed instance IDs:', error)
        return c.json({ error: 'Failed to list claimed instance IDs', message: describeError(error) }, 502)
      }

      const claimed: number[] = []
      const foreign: string[] = []
      for (const name of recordNames) {
        try {
          claimed.push(parseRecordName(name))
        } catch {
          foreign.push(name)
        }
      }
      claimed.sort((a, b) => a - b)
      foreign.sort()

      return c.json({
        total: claimed.length,
        claims: claimed.slice(offset, offset + limit),
        foreign,
        limit,
        offset
      })
    }
  )

  return admin
}
