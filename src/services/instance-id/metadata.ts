import { hostname } from 'os'

import type { InstanceMetadata } from '../../types/instance-id.js'

export interface MetadataOptions {
  applicationName?: string
  serverName?: string
}

/**
 * Resolve the names written into the claimed record.
 * Falls back to the npm package name and the machine's host name.
 */
export function resolveInstanceMetadata(options: MetadataOptions = {}, now: Date = new Date()): InstanceMetadata {
  return {
    applicationName: options.applicationName || process.env.npm_package_name || 'application',
    serverName: options.serverName || hostname(),
    createdAt: now
  }
}

function sanitizeValue(value: string): string {
  return value.replace(/[\r\n]+/g, ' ')
}

/**
 * Record body: newline-separated Key=Value lines.
 * Only for humans inspecting the namespace; the protocol never reads it back.
 */
export function formatRecordContent(metadata: InstanceMetadata): string {
  return [
    `ApplicationName=${sanitizeValue(metadata.applicationName)}`,
    `ServerName=${sanitizeValue(metadata.serverName)}`,
    `CreationDateTime=${metadata.createdAt.toISOString()}`
  ].join('\n')
}
