// src/persistence/redis-client.ts — Redis command port and ioredis adapter
//
// Document stores depend on the narrow RedisCommandClient port; ioredis is
// bound to it here so tests can substitute an in-process mock.

import { Redis } from "ioredis"
import { withTimeout } from "./document-store.js"

export interface RedisConfig {
  url: string
  keyPrefix: string              // Default: "exchange"
  connectTimeoutMs: number       // Default: 5000
  commandTimeoutMs: number       // Default: 3000
}

/** Minimal Redis command interface (subset of ioredis API) */
export interface RedisCommandClient {
  hgetall(key: string): Promise<Record<string, string>>
  eval(script: string, numkeys: number, ...args: string[]): Promise<unknown>
  ping(): Promise<string>
}

export interface IoredisConnection {
  client: RedisCommandClient
  close(): Promise<void>
}

/**
 * Connect an ioredis client and wait for it to become ready, bounded by
 * connectTimeoutMs. A failed connect is logged, not thrown: the caller's
 * ping decides whether the store is usable.
 *
 * One retry per request and no offline queue, so commands against an
 * unreachable Redis reject instead of waiting for a reconnect.
 */
export async function connectIoredisClient(config: RedisConfig): Promise<IoredisConnection> {
  const redis = new Redis(config.url, {
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
  })

  redis.on("error", (err: Error) => {
    console.warn(`[redis] connection error: ${err.message}`)
  })

  try {
    await withTimeout(redis.connect(), config.connectTimeoutMs, "connect")
  } catch (err) {
    console.warn(`[redis] initial connection failed: ${err instanceof Error ? err.message : String(err)}`)
  }

  return {
    client: {
      hgetall: (key) => redis.hgetall(key),
      eval: (script, numkeys, ...args) => redis.eval(script, numkeys, ...args),
      ping: () => redis.ping(),
    },
    close: async () => {
      // QUIT needs a live connection; otherwise stop the reconnect loop
      if (redis.status === "ready") {
        await redis.quit()
      } else {
        redis.disconnect()
      }
    },
  }
}
