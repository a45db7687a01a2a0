// src/persistence/redis-document-store.ts — DocumentStore over a Redis hash with Lua CAS
//
// Each document is a hash with two fields: `body` (JSON text) and `version`
// (a ULID minted per write). The compare and the set run in one Lua script,
// so Redis itself serializes competing writers.

import { ulid } from "ulid"
import type { RedisCommandClient } from "./redis-client.js"
import {
  VERSION_CONFLICT,
  type DocumentStore,
  type ExpectedVersion,
  type VersionedDocument,
  type WriteResult,
} from "./document-store.js"

/**
 * Conditional document write:
 * KEYS[1] = document hash key
 * ARGV[1] = mode: "any" | "absent" | "match"
 * ARGV[2] = expected version (mode "match" only)
 * ARGV[3] = document body
 * ARGV[4] = new version token
 *
 * Returns:
 *   "OK" on success
 *   "CONFLICT" if the stored version does not satisfy the mode
 */
export const CAS_WRITE_LUA = `
local mode = ARGV[1]
local current = redis.call('HGET', KEYS[1], 'version')
if mode == "absent" then
  if current ~= false then
    return "CONFLICT"
  end
elseif mode == "match" then
  if current ~= ARGV[2] then
    return "CONFLICT"
  end
end
redis.call('HSET', KEYS[1], 'body', ARGV[3], 'version', ARGV[4])
return "OK"
`

export class RedisDocumentStore implements DocumentStore {
  readonly kind = "redis"

  constructor(
    private readonly redis: RedisCommandClient,
    private readonly keyPrefix = "exchange",
  ) {}

  private key(name: string): string {
    return `${this.keyPrefix}:doc:${name}`
  }

  async read(name: string): Promise<VersionedDocument> {
    const hash = await this.redis.hgetall(this.key(name))
    const body = hash.body
    const version = hash.version
    if (body === undefined || version === undefined) return { body: null, version: null }
    return { body, version }
  }

  async write(name: string, body: string, expected?: ExpectedVersion): Promise<WriteResult> {
    const mode = expected === undefined ? "any" : expected === null ? "absent" : "match"
    const version = ulid()

    const reply = await this.redis.eval(
      CAS_WRITE_LUA,
      1,
      this.key(name),
      mode,
      expected ?? "",
      body,
      version,
    )

    if (reply === "OK") return { ok: true, version }
    if (reply === "CONFLICT") return VERSION_CONFLICT
    throw new Error(`Unexpected CAS script reply: ${String(reply)}`)
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === "PONG"
    } catch {
      return false
    }
  }
}
