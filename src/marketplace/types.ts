// src/marketplace/types.ts — Listing, Trade, and collection types for the salvage exchange
//
// Listings and trades are each stored as one shared JSON document. A listing
// moves active → sold or active → removed exactly once; trades are append-only.

// ── Constants ────────────────────────────────────────────────

/** Current on-store document layout */
export const COLLECTION_SCHEMA_VERSION = 1

/** Max units a seller may have listed per item type across active listings */
export const DEFAULT_MAX_ACTIVE_UNITS_PER_ITEM_TYPE = 50

/** CAS attempts per ledger operation before surfacing a conflict */
export const DEFAULT_MAX_ATTEMPTS = 3

/** CAS attempts for the best-effort trade log append */
export const DEFAULT_TRADE_LOG_ATTEMPTS = 3

// ── Listing ──────────────────────────────────────────────────

export type ListingStatus = "active" | "sold" | "removed"

export interface Listing {
  listing_id: string
  seller_id: string
  seller_name: string
  item_type: string
  item_name: string
  /** Positive integer, immutable after creation */
  quantity: number
  /** Positive integer credits, immutable after creation */
  asking_price: number
  description: string
  status: ListingStatus
  /** ISO-8601 UTC */
  created_at: string
  buyer_id?: string
  buyer_name?: string
  sold_at?: string
  removed_at?: string
  /** Idempotency token of the operation that finalized this listing */
  transition_id?: string
}

export interface ListingFilter {
  seller_id?: string
  item_type?: string
}

// ── Trade ────────────────────────────────────────────────────

export interface Trade {
  trade_id: string
  listing_id: string
  seller_id: string
  seller_name: string
  buyer_id: string
  buyer_name: string
  item_type: string
  item_name: string
  quantity: number
  /** Asking price of the listing at sale time */
  final_price: number
  completed_at: string
}

// ── Operation inputs ─────────────────────────────────────────

export interface CreateListingInput {
  seller_id: string
  seller_name: string
  item_type: string
  item_name: string
  quantity: number
  asking_price: number
  description?: string
}

export interface BuyListingInput {
  listing_id: string
  buyer_id: string
  buyer_name: string
  /** Price the buyer saw; a mismatch rejects the purchase */
  expected_price?: number
}

export interface CancelListingInput {
  listing_id: string
  seller_id: string
}

// ── Operation outputs ────────────────────────────────────────

export interface PurchaseReceipt {
  listing: Listing
  trade: Trade
  /** False when the sale committed but the trade log append failed */
  trade_recorded: boolean
}

export interface ItemPriceSummary {
  item_type: string
  item_name: string
  trade_count: number
  total_volume: number
  average_price: number
  min_price: number
  max_price: number
  last_price: number
  last_traded_at: string
}

export interface PlayerReputation {
  player_id: string
  player_name: string | null
  trades_as_seller: number
  trades_as_buyer: number
  credits_earned: number
  credits_spent: number
  total_credits_traded: number
  first_trade_at: string | null
  last_trade_at: string | null
}
