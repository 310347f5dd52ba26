/**
 * S3 object store repo
 * Talks to S3 (or any S3-compatible store) over fetch with AWS Signature V4
 */

import { Sha256 } from '@aws-crypto/sha256-js'
import { HttpRequest } from '@aws-sdk/protocol-http'
import { SignatureV4 } from '@aws-sdk/signature-v4'

import { ObjectStoreBackendError, describeError } from '../instance-id/errors.js'
import { ALREADY_EXISTS, CREATED } from './interface.js'

import type { ObjectStoreOperation } from '../instance-id/errors.js'
import type { CreateRecordOptions, CreateRecordResult, DeleteRecordOptions, ObjectStoreRepo } from './interface.js'

export interface S3RepoConfig {
  bucket: string
  region: string
  accessKeyId: string
  secretAccessKey: string
  /** Custom endpoint for S3-compatible stores (path-style addressing is always used) */
  endpoint?: string
  fetch?: typeof fetch
}

interface ObjectVersion {
  key: string
  versionId: string
}

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'"
}

function decodeXml(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity)
}

function readTag(xml: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`).exec(xml)
  return match ? decodeXml(match[1]) : undefined
}

function readBlocks(xml: string, tag: string): string[] {
  const blocks: string[] = []
  const pattern = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, 'g')
  for (const match of xml.matchAll(pattern)) {
    blocks.push(match[1])
  }
  return blocks
}

/**
 * S3-based object store repo
 * A bucket is the namespace; `If-None-Match: *` on PUT provides the conditional create.
 * With `includeDerived`, every object version and delete marker of the record is removed too.
 * That cleanup runs after the record itself is gone, and its failures say so: listing versions
 * needs `s3:ListBucketVersions`, which deleting the record does not.
 */
export class S3ObjectStoreRepo implements ObjectStoreRepo {
  readonly kind = 's3'
  private endpoint: URL
  private signer: SignatureV4
  private fetchImpl: typeof fetch

  constructor(private config: S3RepoConfig) {
    this.endpoint = new URL(config.endpoint || `https://s3.${config.region}.amazonaws.com`)
    this.signer = new SignatureV4({
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey
      },
      region: config.region,
      service: 's3',
      sha256: Sha256,
      // S3 keys are signed exactly as sent
      uriEscapePath: false
    })
    this.fetchImpl = config.fetch ?? fetch
  }

  async ensureNamespace(): Promise<void> {
    const body = this.config.region === 'us-east-1'
      ? undefined
      : `<CreateBucketConfiguration xmlns="http://s3.amazonaws.com/doc/2006-03-01/"><LocationConstraint>${this.config.region}</LocationConstraint></CreateBucketConfiguration>`

    const response = await this.send('ensureNamespace', 'PUT', null, {}, {}, body)
    if (response.status === 200) {
      await response.text()
      console.log(`✓ S3ObjectStoreRepo created bucket ${this.config.bucket}`)
      return
    }

    const text = await response.text()
    if (response.status === 409 && readTag(text, 'Code') === 'BucketAlreadyOwnedByYou') {
      return
    }
    throw this.unexpected('ensureNamespace', response.status, text, `ensure bucket ${this.config.bucket} exists`)
  }

  async listRecordNames(): Promise<string[]> {
    const names: string[] = []
    let continuationToken: string | undefined

    do {
      const query: Record<string, string> = { 'list-type': '2' }
      if (continuationToken) {
        query['continuation-token'] = continuationToken
      }

      const response = await this.send('listRecordNames', 'GET', null, query)
      const text = await response.text()
      if (response.status !== 200) {
        throw this.unexpected('listRecordNames', response.status, text, `list bucket ${this.config.bucket}`)
      }

      for (const block of readBlocks(text, 'Contents')) {
        const key = readTag(block, 'Key')
        if (key !== undefined) {
          names.push(key)
        }
      }

      continuationToken = readTag(text, 'IsTruncated') === 'true' ? readTag(text, 'NextContinuationToken') : undefined
    } while (continuationToken)

    return names
  }

  async createRecord(name: string, content: string, options: CreateRecordOptions): Promise<CreateRecordResult> {
    const headers: Record<string, string> = { 'content-type': 'text/plain; charset=utf-8' }
    if (!options.overwrite) {
      headers['if-none-match'] = '*'
    }

    const response = await this.send('createRecord', 'PUT', name, {}, headers, content)
    if (response.status === 200) {
      await response.text()
      return CREATED
    }
    // 412: the key exists. 409: a concurrent conditional write on the same key is in progress.
    if (!options.overwrite && (response.status === 412 || response.status === 409)) {
      return ALREADY_EXISTS
    }
    throw this.unexpected('createRecord', response.status, await response.text(), `create record ${name}`)
  }

  async deleteRecord(name: string, options: DeleteRecordOptions): Promise<void> {
    const response = await this.send('deleteRecord', 'DELETE', name)
    const text = await response.text()
    if (response.status !== 204 && response.status !== 200) {
      throw this.unexpected('deleteRecord', response.status, text, `delete record ${name}`)
    }

    if (!options.includeDerived) {
      return
    }

    try {
      await this.deleteVersions(name)
    } catch (error) {
      throw new ObjectStoreBackendError(
        `Record ${name} was deleted but its versions were not cleaned up: ${describeError(error)}`,
        'deleteRecord',
        error instanceof ObjectStoreBackendError ? error.status : undefined,
        { cause: error }
      )
    }
  }

  private async deleteVersions(name: string): Promise<void> {
    for (const version of await this.listVersions(name)) {
      const response = await this.send('deleteRecord', 'DELETE', name, { versionId: version.versionId })
      const text = await response.text()
      if (response.status !== 204 && response.status !== 200) {
        throw this.unexpected('deleteRecord', response.status, text, `delete version ${version.versionId} of record ${name}`)
      }
    }
  }

  private async listVersions(name: string): Promise<ObjectVersion[]> {
    const response = await this.send('deleteRecord', 'GET', null, { versions: '', prefix: name })
    const text = await response.text()
    if (response.status !== 200) {
      throw this.unexpected('deleteRecord', response.status, text, `list versions of record ${name}`)
    }

    const versions: ObjectVersion[] = []
    for (const block of [...readBlocks(text, 'Version'), ...readBlocks(text, 'DeleteMarker')]) {
      const key = readTag(block, 'Key')
      const versionId = readTag(block, 'VersionId')
      // The prefix filter also matches longer names ("1" matches "10")
      if (key === name && versionId !== undefined) {
        versions.push({ key, versionId })
      }
    }
    return versions
  }

  private async send(
    operation: ObjectStoreOperation,
    method: string,
    key: string | null,
    query: Record<string, string> = {},
    headers: Record<string, string> = {},
    body?: string
  ): Promise<Response> {
    const basePath = this.endpoint.pathname.replace(/\/$/, '')
    const path = key === null
      ? `${basePath}/${this.config.bucket}`
      : `${basePath}/${this.config.bucket}/${encodeURIComponent(key)}`

    const httpRequest = new HttpRequest({
      method,
      protocol: this.endpoint.protocol,
      hostname: this.endpoint.hostname,
      port: this.endpoint.port ? Number(this.endpoint.port) : undefined,
      path,
      query,
      headers: {
        ...headers,
        host: this.endpoint.host
      },
      body
    })

    const signedRequest = await this.signer.sign(httpRequest)

    const url = new URL(path, this.endpoint.origin)
    for (const [name, value] of Object.entries(query)) {
      url.searchParams.set(name, value)
    }

    try {
      return await this.fetchImpl(url, {
        method,
        headers: signedRequest.headers,
        body
      })
    } catch (error) {
      throw new ObjectStoreBackendError(
        `S3 request ${method} ${url.pathname} failed: ${describeError(error)}`,
        operation,
        undefined,
        { cause: error }
      )
    }
  }

  private unexpected(operation: ObjectStoreOperation, status: number, body: string, action: string): ObjectStoreBackendError {
    const code = readTag(body, 'Code')
    return new ObjectStoreBackendError(
      `Received an unexpected status code trying to ${action}: ${status}${code ? ` (${code})` : ''}`,
      operation,
      status
    )
  }
}
