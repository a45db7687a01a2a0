// src/config.ts — Configuration loader from environment variables

import type { ObjectClientConfig } from "./persistence/object-client.js"
import type { RedisConfig } from "./persistence/redis-client.js"

export interface ExchangeConfig {
  // Gateway
  port: number
  host: string

  // Persistence
  store: StoreKind
  storeFallback: boolean          // Fall back to memory if the store is down at boot
  s3: ObjectClientConfig & { prefix: string }
  redis: RedisConfig
  listingsKey: string
  tradesKey: string

  // Ledger
  ledger: {
    maxAttempts: number           // CAS ceiling per operation (1..10)
    tradeLogAttempts: number
    maxActiveUnitsPerItemType: number
    storeTimeoutMs: number
  }

  // Gateway hardening
  auth: {
    corsOrigins: string[]
    rateLimiting: {
      windowMs: number
      limits: Record<LimitedOperation, number>   // Per client, per window
    }
    trustProxy: boolean
  }
}

const VALID_STORES = ["s3", "redis", "memory"] as const
export type StoreKind = (typeof VALID_STORES)[number]

/** Mutating marketplace operations, each with its own rate budget */
export type LimitedOperation = "create_listing" | "buy_listing" | "cancel_listing"

type Env = Record<string, string | undefined>

function parseStore(value: string | undefined): StoreKind {
  const v = (value ?? "memory").trim().toLowerCase()
  const match = VALID_STORES.find((kind) => kind === v)
  if (match) return match
  throw new Error(`EXCHANGE_STORE must be one of ${VALID_STORES.join(", ")} (got "${value}")`)
}

function parseBoolEnv(env: Env, envKey: string, fallback: boolean): boolean {
  const raw = env[envKey]
  if (raw === undefined || raw === "") return fallback
  const v = raw.trim().toLowerCase()
  if (v === "true" || v === "1") return true
  if (v === "false" || v === "0") return false
  throw new Error(`${envKey} must be true or false (got "${raw}")`)
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  if (value < min || value > max) {
    throw new Error(`${envKey} must be between ${min} and ${max} (got ${value})`)
  }
  return value
}

export function loadConfig(env: Env = process.env): ExchangeConfig {
  const store = parseStore(env.EXCHANGE_STORE)

  const s3 = {
    endpoint: env.S3_ENDPOINT ?? "",
    region: env.S3_REGION ?? "auto",
    bucket: env.S3_BUCKET ?? "salvage-exchange",
    accessKeyId: env.S3_ACCESS_KEY_ID ?? "",
    secretAccessKey: env.S3_SECRET_ACCESS_KEY ?? "",
    prefix: env.S3_PREFIX ?? "trading",
  }
  if (store === "s3" && (!s3.endpoint || !s3.accessKeyId || !s3.secretAccessKey)) {
    throw new Error("EXCHANGE_STORE=s3 requires S3_ENDPOINT, S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY")
  }

  const redis: RedisConfig = {
    url: env.REDIS_URL ?? "",
    keyPrefix: env.REDIS_KEY_PREFIX ?? "exchange",
    connectTimeoutMs: parseIntEnv(env, "REDIS_CONNECT_TIMEOUT_MS", "5000", 1),
    commandTimeoutMs: parseIntEnv(env, "REDIS_COMMAND_TIMEOUT_MS", "3000", 1),
  }
  if (store === "redis" && !redis.url) {
    throw new Error("EXCHANGE_STORE=redis requires REDIS_URL")
  }

  // Per-operation overrides default to the shared EXCHANGE_RATE_LIMIT_MAX
  const defaultLimit = String(parseIntEnv(env, "EXCHANGE_RATE_LIMIT_MAX", "120", 1))

  return {
    port: parseIntEnv(env, "PORT", "3000", 0, 65535),
    host: env.HOST ?? "0.0.0.0",

    store,
    storeFallback: parseBoolEnv(env, "EXCHANGE_STORE_FALLBACK", true),
    s3,
    redis,
    listingsKey: env.EXCHANGE_LISTINGS_KEY || "listings.json",
    tradesKey: env.EXCHANGE_TRADES_KEY || "completed_trades.json",

    ledger: {
      maxAttempts: parseIntEnv(env, "EXCHANGE_MAX_ATTEMPTS", "3", 1, 10),
      tradeLogAttempts: parseIntEnv(env, "EXCHANGE_TRADE_LOG_ATTEMPTS", "3", 1, 10),
      maxActiveUnitsPerItemType: parseIntEnv(env, "EXCHANGE_MAX_UNITS_PER_ITEM_TYPE", "50", 1),
      storeTimeoutMs: parseIntEnv(env, "EXCHANGE_STORE_TIMEOUT_MS", "5000", 1),
    },

    auth: {
      corsOrigins: (env.EXCHANGE_CORS_ORIGINS ?? "*")
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
      rateLimiting: {
        windowMs: parseIntEnv(env, "EXCHANGE_RATE_LIMIT_WINDOW_MS", "60000", 1),
        limits: {
          create_listing: parseIntEnv(env, "EXCHANGE_RATE_LIMIT_CREATE_MAX", defaultLimit, 1),
          buy_listing: parseIntEnv(env, "EXCHANGE_RATE_LIMIT_BUY_MAX", defaultLimit, 1),
          cancel_listing: parseIntEnv(env, "EXCHANGE_RATE_LIMIT_CANCEL_MAX", defaultLimit, 1),
        },
      },
      trustProxy: parseBoolEnv(env, "EXCHANGE_TRUST_PROXY", false),
    },
  }
}
