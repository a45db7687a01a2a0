// src/index.ts — salvage-exchange entry point
// Boot sequence: config → document store → ledger → gateway → serve

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createDocumentStore } from "./persistence/index.js"
import { MarketplaceLedger } from "./marketplace/ledger.js"
import { createApp } from "./gateway/server.js"

async function main() {
  const bootStart = Date.now()
  console.log("[exchange] booting salvage-exchange...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[exchange] config loaded: store=${config.store}, port=${config.port}`)

  // 2. Document store (probe, optional memory fallback)
  const storeHandle = await createDocumentStore(config)

  // 3. Ledger
  const ledger = new MarketplaceLedger({
    store: storeHandle.store,
    listingsKey: config.listingsKey,
    tradesKey: config.tradesKey,
    maxAttempts: config.ledger.maxAttempts,
    tradeLogAttempts: config.ledger.tradeLogAttempts,
    maxActiveUnitsPerItemType: config.ledger.maxActiveUnitsPerItemType,
    storeTimeoutMs: config.ledger.storeTimeoutMs,
  })
  console.log(
    `[exchange] ledger ready: max_attempts=${config.ledger.maxAttempts}, ` +
      `unit_cap=${config.ledger.maxActiveUnitsPerItemType}`,
  )

  // 4. Gateway
  const app = createApp(config, {
    ledger,
    store: storeHandle.store,
    degraded: storeHandle.degraded,
  })

  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const status = storeHandle.degraded ? "degraded" : "healthy"
    console.log(`[exchange] ready on :${info.port} (boot: ${bootDuration}ms, status: ${status})`)
  })

  // 5. Graceful shutdown: stop accepting requests, then release the store
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[exchange] ${signal} received, shutting down gracefully...`)

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) console.error("[exchange] server close error:", err)
        resolve()
      })
    })

    try {
      await storeHandle.close()
    } catch (err) {
      console.error("[exchange] store close error:", err)
    }

    console.log(`[exchange] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    // Start force-exit timer on first signal
    setTimeout(() => {
      console.error("[exchange] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[exchange] shutdown failed:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err: unknown) => {
  console.error("[exchange] fatal:", err)
  process.exit(1)
})
