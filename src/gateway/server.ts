// src/gateway/server.ts — Hono HTTP server with routes

import { Hono } from "hono"
import type { ExchangeConfig } from "../config.js"
import type { DocumentStore } from "../persistence/document-store.js"
import type { MarketplaceLedger } from "../marketplace/ledger.js"
import { corsMiddleware } from "./cors.js"
import { TradeRateLimiter } from "./rate-limit.js"
import { createMarketplaceRoutes } from "./routes/marketplace.js"

export interface AppOptions {
  ledger: MarketplaceLedger
  store: DocumentStore
  /** True when running on the memory fallback instead of the configured store */
  degraded?: boolean
  /** Injected limiter (tests); built from config otherwise */
  rateLimiter?: TradeRateLimiter
  /** Sweep expired rate windows every five minutes. Default: true */
  sweepRateLimiter?: boolean
}

export function createApp(config: Pick<ExchangeConfig, "auth" | "store">, options: AppOptions) {
  const app = new Hono()
  const startedAt = Date.now()

  const limiter = options.rateLimiter ?? new TradeRateLimiter(config.auth.rateLimiting)
  if (options.sweepRateLimiter ?? true) {
    setInterval(() => limiter.sweep(), 300_000).unref()
  }

  app.use("*", corsMiddleware(config))

  // Health endpoint: 503 when the document store cannot be reached.
  // Reports the backend kind, never connection details.
  app.get("/health", async (c) => {
    const reachable = await options.store.ping()
    const body = {
      status: reachable ? (options.degraded ? "degraded" : "healthy") : "unhealthy",
      uptime_ms: Date.now() - startedAt,
      store: {
        configured: config.store,
        active: options.store.kind,
        reachable,
      },
    }
    return c.json(body, reachable ? 200 : 503)
  })

  app.route("/", createMarketplaceRoutes({
    ledger: options.ledger,
    rateLimit: { limiter, trustProxy: config.auth.trustProxy },
  }))

  app.notFound((c) => c.json({ success: false, error: "Not Found", code: "NOT_FOUND" }, 404))

  // Unexpected failures: log the cause, return nothing internal
  app.onError((err, c) => {
    console.error(`[gateway] unhandled error on ${c.req.method} ${c.req.path}:`, err)
    return c.json({ success: false, error: "Internal server error", code: "INTERNAL_ERROR" }, 500)
  })

  return app
}
