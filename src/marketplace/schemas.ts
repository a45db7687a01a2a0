// src/marketplace/schemas.ts — TypeBox schemas and codecs for the stored collections
//
// Documents are validated on every read. A document that fails validation is
// reported as corrupt, never decoded as an empty collection.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { COLLECTION_SCHEMA_VERSION } from "./types.js"
import type { Listing, Trade } from "./types.js"

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const ListingSchema = Type.Object({
  listing_id: Type.String(),
  seller_id: Type.String(),
  seller_name: Type.String(),
  item_type: Type.String(),
  item_name: Type.String(),
  quantity: Type.Integer({ minimum: 1 }),
  asking_price: Type.Integer({ minimum: 1 }),
  description: Type.String(),
  status: Type.Union([Type.Literal("active"), Type.Literal("sold"), Type.Literal("removed")]),
  created_at: Type.String(),
  buyer_id: Type.Optional(Type.String()),
  buyer_name: Type.Optional(Type.String()),
  sold_at: Type.Optional(Type.String()),
  removed_at: Type.Optional(Type.String()),
  transition_id: Type.Optional(Type.String()),
})

const TradeSchema = Type.Object({
  trade_id: Type.String(),
  listing_id: Type.String(),
  seller_id: Type.String(),
  seller_name: Type.String(),
  buyer_id: Type.String(),
  buyer_name: Type.String(),
  item_type: Type.String(),
  item_name: Type.String(),
  quantity: Type.Integer({ minimum: 1 }),
  final_price: Type.Integer({ minimum: 1 }),
  completed_at: Type.String(),
})

const ListingCollectionSchema = Type.Object({
  schema_version: Type.Integer(),
  listings: Type.Array(ListingSchema),
})

const TradeCollectionSchema = Type.Object({
  schema_version: Type.Integer(),
  trades: Type.Array(TradeSchema),
})

/** Legacy layout: the collection stored as a bare array */
const LegacyListingsSchema = Type.Array(ListingSchema)
const LegacyTradesSchema = Type.Array(TradeSchema)

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown when a stored collection is not valid JSON or fails its schema. */
export class DocumentCorruptError extends Error {
  constructor(readonly documentName: string, reason: string) {
    super(`Corrupt ${documentName} document: ${reason}`)
    this.name = "DocumentCorruptError"
  }
}

function parseJson(documentName: string, body: string): unknown {
  try {
    return JSON.parse(body)
  } catch (err) {
    throw new DocumentCorruptError(documentName, err instanceof Error ? err.message : "invalid JSON")
  }
}

function describeFirstError(schema: Parameters<typeof Value.Errors>[0], value: unknown): string {
  const first = Value.Errors(schema, value).First()
  return first ? `${first.path || "/"}: ${first.message}` : "schema mismatch"
}

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

/** Decode the listings document. A missing document is an empty collection. */
export function decodeListings(body: string | null): Listing[] {
  if (body === null) return []
  const parsed = parseJson("listings", body)
  if (Value.Check(LegacyListingsSchema, parsed)) return parsed
  if (Value.Check(ListingCollectionSchema, parsed)) return parsed.listings
  throw new DocumentCorruptError("listings", describeFirstError(ListingCollectionSchema, parsed))
}

export function encodeListings(listings: readonly Listing[]): string {
  return JSON.stringify({ schema_version: COLLECTION_SCHEMA_VERSION, listings }, null, 2)
}

/** Decode the trades document. A missing document is an empty collection. */
export function decodeTrades(body: string | null): Trade[] {
  if (body === null) return []
  const parsed = parseJson("trades", body)
  if (Value.Check(LegacyTradesSchema, parsed)) return parsed
  if (Value.Check(TradeCollectionSchema, parsed)) return parsed.trades
  throw new DocumentCorruptError("trades", describeFirstError(TradeCollectionSchema, parsed))
}

export function encodeTrades(trades: readonly Trade[]): string {
  return JSON.stringify({ schema_version: COLLECTION_SCHEMA_VERSION, trades }, null, 2)
}
