// src/gateway/routes/marketplace.ts — Marketplace HTTP endpoints
//
// - GET    /listings                       → active listings (filters: seller_id, item_type)
// - POST   /listings                       → create listing
// - POST   /listings/:listing_id/buy       → buy listing
// - DELETE /listings/:listing_id           → cancel listing (seller only)
// - GET    /history/:player_id             → trades the player took part in
// - GET    /market/prices                  → per-item price summary
// - GET    /players/:player_id/reputation  → trading reputation
//
// The ledger already retried version conflicts; nothing here retries.

import { Hono, type Context, type MiddlewareHandler } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import { Type, type TSchema, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { MarketplaceLedger } from "../../marketplace/ledger.js"
import {
  validationError,
  type MarketplaceError,
  type MarketplaceErrorCode,
} from "../../marketplace/errors.js"
import type { LimitedOperation } from "../../config.js"
import { limitOperation, type OperationLimit } from "../rate-limit.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MarketplaceRouteDeps {
  ledger: MarketplaceLedger
  /** Per-client budgets for create, buy and cancel; omitted means unlimited */
  rateLimit?: OperationLimit
}

const ERROR_STATUS: Record<MarketplaceErrorCode, ContentfulStatusCode> = {
  VALIDATION_FAILED: 400,
  SELF_TRADE: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  PRICE_CHANGED: 412,
  CAPACITY_EXCEEDED: 422,
  STORE_UNAVAILABLE: 503,
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const CreateListingBody = Type.Object({
  seller_id: Type.String(),
  seller_name: Type.String(),
  item_type: Type.String(),
  item_name: Type.String(),
  quantity: Type.Number(),
  asking_price: Type.Number(),
  description: Type.Optional(Type.String()),
})

const BuyListingBody = Type.Object({
  buyer_id: Type.String(),
  buyer_name: Type.String(),
  expected_price: Type.Optional(Type.Number()),
})

const CancelListingBody = Type.Object({
  seller_id: Type.String(),
})

type BodyResult<T> = { ok: true; body: T } | { ok: false; error: MarketplaceError }

/** Parse the JSON body and check it against a schema; report the first failing field. */
async function readBody<S extends TSchema>(c: Context, schema: S): Promise<BodyResult<Static<S>>> {
  let raw: unknown
  try {
    raw = await c.req.json<unknown>()
  } catch {
    return { ok: false, error: validationError("body", "Request body must be valid JSON") }
  }

  if (Value.Check(schema, raw)) return { ok: true, body: raw }

  const first = Value.Errors(schema, raw).First()
  const field = first?.path.replace(/^\//, "").split("/")[0] || "body"
  return {
    ok: false,
    error: validationError(field, first ? `Invalid ${field}: ${first.message}` : "Invalid request body"),
  }
}

function errorResponse(c: Context, error: MarketplaceError): Response {
  return c.json({ success: false, ...error.toJSON() }, ERROR_STATUS[error.code])
}

function optionalQuery(c: Context, name: string): string | undefined {
  const value = c.req.query(name)
  return value ? value : undefined
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export function createMarketplaceRoutes(deps: MarketplaceRouteDeps): Hono {
  const app = new Hono()
  const { ledger, rateLimit } = deps

  const limit = (operation: LimitedOperation): MiddlewareHandler =>
    rateLimit ? limitOperation(rateLimit, operation, errorResponse) : async (_c, next) => { await next() }

  // GET /listings — Browse active listings, newest first
  app.get("/listings", async (c) => {
    const result = await ledger.listActiveListings({
      seller_id: optionalQuery(c, "seller_id"),
      item_type: optionalQuery(c, "item_type"),
    })
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, listings: result.value, total: result.value.length })
  })

  // POST /listings — Create a listing
  app.post("/listings", limit("create_listing"), async (c) => {
    const parsed = await readBody(c, CreateListingBody)
    if (!parsed.ok) return errorResponse(c, parsed.error)

    const result = await ledger.createListing(parsed.body)
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, listing: result.value }, 201)
  })

  // POST /listings/:listing_id/buy — Buy a listing
  app.post("/listings/:listing_id/buy", limit("buy_listing"), async (c) => {
    const parsed = await readBody(c, BuyListingBody)
    if (!parsed.ok) return errorResponse(c, parsed.error)

    const result = await ledger.buyListing({
      listing_id: c.req.param("listing_id"),
      buyer_id: parsed.body.buyer_id,
      buyer_name: parsed.body.buyer_name,
      expected_price: parsed.body.expected_price,
    })
    if (!result.ok) return errorResponse(c, result.error)

    const { listing, trade, trade_recorded } = result.value
    return c.json({
      success: true,
      listing,
      trade,
      trade_recorded,
      item: {
        item_type: listing.item_type,
        item_name: listing.item_name,
        quantity: listing.quantity,
        price_paid: trade.final_price,
      },
    })
  })

  // DELETE /listings/:listing_id — Cancel a listing (seller only)
  app.delete("/listings/:listing_id", limit("cancel_listing"), async (c) => {
    const parsed = await readBody(c, CancelListingBody)
    if (!parsed.ok) return errorResponse(c, parsed.error)

    const result = await ledger.cancelListing({
      listing_id: c.req.param("listing_id"),
      seller_id: parsed.body.seller_id,
    })
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, listing: result.value })
  })

  // GET /history/:player_id — Trade history for one player
  app.get("/history/:player_id", async (c) => {
    const playerId = c.req.param("player_id")
    const result = await ledger.tradeHistory(playerId)
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, player_id: playerId, trades: result.value, total: result.value.length })
  })

  // GET /market/prices — Price summary per item
  app.get("/market/prices", async (c) => {
    const result = await ledger.marketPrices()
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, prices: result.value })
  })

  // GET /players/:player_id/reputation — Trading reputation
  app.get("/players/:player_id/reputation", async (c) => {
    const result = await ledger.playerReputation(c.req.param("player_id"))
    if (!result.ok) return errorResponse(c, result.error)
    return c.json({ success: true, reputation: result.value })
  })

  return app
}
