// src/persistence/object-document-store.ts — DocumentStore over an S3-compatible bucket
//
// The object's ETag is the version token. Conditional writes map onto
// If-None-Match: * (expected === null) and If-Match: <etag> (expected token).

import type { IObjectClient } from "./object-client.js"
import {
  VERSION_CONFLICT,
  type DocumentStore,
  type ExpectedVersion,
  type VersionedDocument,
  type WriteResult,
} from "./document-store.js"

export class ObjectDocumentStore implements DocumentStore {
  readonly kind = "s3"

  constructor(
    private readonly client: IObjectClient,
    private readonly prefix = "",
  ) {}

  private key(name: string): string {
    return this.prefix ? `${this.prefix}/${name}` : name
  }

  async read(name: string): Promise<VersionedDocument> {
    const obj = await this.client.get(this.key(name))
    if (!obj) return { body: null, version: null }
    return { body: obj.data, version: obj.etag }
  }

  async write(name: string, body: string, expected?: ExpectedVersion): Promise<WriteResult> {
    const key = this.key(name)

    if (expected === undefined) {
      const { etag } = await this.client.put(key, body)
      return { ok: true, version: etag }
    }

    if (expected === null) {
      const result = await this.client.putIfAbsent(key, body)
      return result.created ? { ok: true, version: result.etag ?? "" } : VERSION_CONFLICT
    }

    const result = await this.client.putIfMatch(key, body, expected)
    return result.updated ? { ok: true, version: result.etag ?? "" } : VERSION_CONFLICT
  }

  ping(): Promise<boolean> {
    return this.client.isAvailable()
  }
}
