// tests/persistence/store-factory.test.ts — Backend selection and memory fallback at boot

import { describe, it, expect, vi, afterEach, beforeEach } from "vitest"
import { createDocumentStore } from "../../src/persistence/index.js"
import { InMemoryDocumentStore, type DocumentStore } from "../../src/persistence/document-store.js"
import { loadConfig } from "../../src/config.js"
import { startFakeRedis, type FakeRedisServer } from "../helpers/resp-server.js"

function stubStore(kind: string, reachable: boolean): DocumentStore {
  const inner = new InMemoryDocumentStore()
  return {
    kind,
    read: (key) => inner.read(key),
    write: (key, body, expected) => inner.write(key, body, expected),
    ping: async () => reachable,
  }
}

const s3Env = {
  EXCHANGE_STORE: "s3",
  S3_ENDPOINT: "http://localhost:9000",
  S3_ACCESS_KEY_ID: "test-key",
  S3_SECRET_ACCESS_KEY: "test-secret",
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("createDocumentStore", () => {
  it("builds a memory store without probing anything", async () => {
    const handle = await createDocumentStore(loadConfig({}))
    expect(handle.store.kind).toBe("memory")
    expect(handle.degraded).toBe(false)
  })

  it("uses a reachable backend", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})
    const s3 = vi.fn(() => stubStore("s3", true))

    const handle = await createDocumentStore(loadConfig(s3Env), { s3 })

    expect(s3).toHaveBeenCalledWith(expect.objectContaining({ bucket: "salvage-exchange", prefix: "trading" }))
    expect(handle.store.kind).toBe("s3")
    expect(handle.degraded).toBe(false)
  })

  it("falls back to memory when the backend is unreachable", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const close = vi.fn(async () => {})
    const redis = vi.fn(async () => ({ store: stubStore("redis", false), close }))

    const handle = await createDocumentStore(
      loadConfig({ EXCHANGE_STORE: "redis", REDIS_URL: "redis://localhost:6379" }),
      { redis },
    )

    expect(handle.store.kind).toBe("memory")
    expect(handle.degraded).toBe(true)
    expect(close).toHaveBeenCalledOnce()
    expect(warn).toHaveBeenCalledWith(
      '[exchange] document store "redis" unreachable, falling back to memory (data will not persist)',
    )
  })

  it("fails boot when fallback is disabled", async () => {
    const s3 = vi.fn(() => stubStore("s3", false))

    await expect(
      createDocumentStore(loadConfig({ ...s3Env, EXCHANGE_STORE_FALLBACK: "false" }), { s3 }),
    ).rejects.toThrow('Document store "s3" is unreachable')
  })
})

describe("createDocumentStore with the ioredis client", () => {
  let server: FakeRedisServer

  beforeEach(async () => {
    server = await startFakeRedis()
  })

  afterEach(async () => {
    await server.close()
  })

  it("selects a reachable Redis once the connection is ready", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {})

    const handle = await createDocumentStore(
      loadConfig({ EXCHANGE_STORE: "redis", REDIS_URL: server.url, EXCHANGE_STORE_FALLBACK: "false" }),
    )

    try {
      expect(handle.store.kind).toBe("redis")
      expect(handle.degraded).toBe(false)
      expect(server.commands).toContain("PING")

      const written = await handle.store.write("listings.json", "[]", null)
      expect(written.ok).toBe(true)
      expect(await handle.store.read("listings.json")).toEqual({
        body: "[]",
        version: written.ok ? written.version : "",
      })
      expect(await handle.store.write("listings.json", "[1]", null)).toEqual({ ok: false, reason: "version_conflict" })
      expect(server.hashes.get("exchange:doc:listings.json")?.get("body")).toBe("[]")
    } finally {
      await handle.close()
    }
  })

  it("treats a refused connection as unreachable", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const url = server.url
    await server.close()
    server = await startFakeRedis()

    await expect(
      createDocumentStore(loadConfig({
        EXCHANGE_STORE: "redis",
        REDIS_URL: url,
        REDIS_CONNECT_TIMEOUT_MS: "500",
        EXCHANGE_STORE_FALLBACK: "false",
      })),
    ).rejects.toThrow('Document store "redis" is unreachable')
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("[redis] initial connection failed:"))
  })
})
