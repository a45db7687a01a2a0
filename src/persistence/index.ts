// src/persistence/index.ts — Document store selection and boot-time fallback

import type { ExchangeConfig } from "../config.js"
import { InMemoryDocumentStore, type DocumentStore } from "./document-store.js"
import { ObjectDocumentStore } from "./object-document-store.js"
import { S3ObjectClient } from "./object-client.js"
import { connectIoredisClient } from "./redis-client.js"
import { RedisDocumentStore } from "./redis-document-store.js"

export { InMemoryDocumentStore, StoreTimeoutError, withTimeout } from "./document-store.js"
export type { DocumentStore, ExpectedVersion, VersionedDocument, WriteResult } from "./document-store.js"

export interface StoreHandle {
  store: DocumentStore
  /** True when the configured backend was unreachable and memory took over */
  degraded: boolean
  close(): Promise<void>
}

type StoreConfig = Pick<ExchangeConfig, "store" | "storeFallback" | "s3" | "redis">

export interface StoreFactories {
  s3?: (config: StoreConfig["s3"]) => DocumentStore
  redis?: (config: StoreConfig["redis"]) => Promise<{ store: DocumentStore; close(): Promise<void> }>
}

const defaultFactories: Required<StoreFactories> = {
  s3: (config) => new ObjectDocumentStore(new S3ObjectClient(config), config.prefix),
  redis: async (config) => {
    const { client, close } = await connectIoredisClient(config)
    return { store: new RedisDocumentStore(client, config.keyPrefix), close }
  },
}

/**
 * Build the configured store and probe it. An unreachable backend either
 * fails boot or, with fallback enabled, is replaced by a process-local store.
 */
export async function createDocumentStore(
  config: StoreConfig,
  factories: StoreFactories = {},
): Promise<StoreHandle> {
  if (config.store === "memory") {
    return { store: new InMemoryDocumentStore(), degraded: false, close: async () => {} }
  }

  let store: DocumentStore
  let close: () => Promise<void> = async () => {}
  if (config.store === "s3") {
    store = (factories.s3 ?? defaultFactories.s3)(config.s3)
  } else {
    const redis = await (factories.redis ?? defaultFactories.redis)(config.redis)
    store = redis.store
    close = redis.close
  }

  if (await store.ping()) {
    console.log(`[exchange] document store: ${store.kind}`)
    return { store, degraded: false, close }
  }

  await close().catch((err: unknown) => {
    console.warn(`[exchange] closing unreachable store failed: ${err instanceof Error ? err.message : String(err)}`)
  })

  if (!config.storeFallback) {
    throw new Error(`Document store "${config.store}" is unreachable`)
  }

  console.warn(`[exchange] document store "${config.store}" unreachable, falling back to memory (data will not persist)`)
  return { store: new InMemoryDocumentStore(), degraded: true, close: async () => {} }
}
