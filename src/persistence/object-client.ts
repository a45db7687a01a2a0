// src/persistence/object-client.ts
// IObjectClient: S3-compatible client wrapper with conditional write support.
// Extends basic get/put with putIfAbsent (If-None-Match: *) and
// putIfMatch (If-Match: etag) so documents can be updated compare-and-swap.

import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3"

export interface ObjectClientConfig {
  endpoint: string
  region: string
  bucket: string
  accessKeyId: string
  secretAccessKey: string
}

export interface GetResult {
  data: string
  etag: string
}

export interface PutResult {
  etag: string
}

export interface ConditionalPutResult {
  created: boolean
  etag?: string
}

export interface ConditionalUpdateResult {
  updated: boolean
  etag?: string
}

export interface IObjectClient {
  get(key: string): Promise<GetResult | null>
  put(key: string, data: string): Promise<PutResult>
  /** Write only if key does not exist (If-None-Match: *). Returns { created: false } on 412. */
  putIfAbsent(key: string, data: string): Promise<ConditionalPutResult>
  /** Write only if etag matches (If-Match: etag). Returns { updated: false } on 412. */
  putIfMatch(key: string, data: string, etag: string): Promise<ConditionalUpdateResult>
  /** Cheap bucket probe */
  isAvailable(): Promise<boolean>
}

function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof S3ServiceException) return err.$metadata.httpStatusCode
  return undefined
}

/**
 * 412 is the documented precondition failure. S3 answers 409
 * (ConditionalRequestConflict) when two conditional writes race in flight.
 */
export function isPreconditionFailed(err: unknown): boolean {
  const status = httpStatusOf(err)
  return status === 412 || status === 409
}

export function isNotFound(err: unknown): boolean {
  return httpStatusOf(err) === 404
}

export class S3ObjectClient implements IObjectClient {
  private readonly client: S3Client
  private readonly bucket: string

  constructor(config: ObjectClientConfig) {
    this.bucket = config.bucket
    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint || undefined,
      forcePathStyle: !!config.endpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    })
  }

  async get(key: string): Promise<GetResult | null> {
    try {
      const resp = await this.client.send(new GetObjectCommand({
        Bucket: this.bucket,
        Key: key,
      }))
      const body = await resp.Body?.transformToString("utf-8")
      if (body === undefined) return null
      return { data: body, etag: resp.ETag ?? "" }
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async put(key: string, data: string): Promise<PutResult> {
    const resp = await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: data,
      ContentType: "application/json",
    }))
    return { etag: resp.ETag ?? "" }
  }

  async putIfAbsent(key: string, data: string): Promise<ConditionalPutResult> {
    try {
      const resp = await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: "application/json",
        IfNoneMatch: "*",
      }))
      return { created: true, etag: resp.ETag ?? "" }
    } catch (err) {
      if (isPreconditionFailed(err)) return { created: false }
      throw err
    }
  }

  async putIfMatch(key: string, data: string, etag: string): Promise<ConditionalUpdateResult> {
    try {
      const resp = await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: data,
        ContentType: "application/json",
        IfMatch: etag,
      }))
      return { updated: true, etag: resp.ETag ?? "" }
    } catch (err) {
      if (isPreconditionFailed(err)) return { updated: false }
      throw err
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.send(new ListObjectsV2Command({
        Bucket: this.bucket,
        MaxKeys: 1,
      }))
      return true
    } catch {
      return false
    }
  }
}
