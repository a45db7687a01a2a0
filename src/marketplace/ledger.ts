// src/marketplace/ledger.ts — Marketplace ledger: CAS-retry state transitions over shared documents
//
// The listings collection is one document. Every mutating operation runs the
// same loop: read snapshot + version, compute a new snapshot, conditional
// write against the version it read. A lost race re-reads and recomputes from
// scratch; the store alone decides which writer went first.
//
// Each call mints one idempotency token up front (the listing id for create,
// the transition id for buy and cancel). A write whose acknowledgement is
// lost is never blindly repeated: the next read checks whether the token is
// already in the document.

import { ulid } from "ulid"
import {
  StoreTimeoutError,
  withTimeout,
  type DocumentStore,
  type VersionedDocument,
  type WriteResult,
} from "../persistence/document-store.js"
import {
  MarketplaceError,
  capacityError,
  conflictError,
  fail,
  forbiddenError,
  notFoundError,
  ok,
  priceChangedError,
  selfTradeError,
  storeUnavailableError,
  validationError,
  type LedgerResult,
} from "./errors.js"
import { ListingRepository } from "./listing-repository.js"
import { TradeRepository } from "./trade-repository.js"
import {
  DocumentCorruptError,
  decodeListings,
  decodeTrades,
  encodeListings,
  encodeTrades,
} from "./schemas.js"
import { playerReputation, summarizePrices } from "./stats.js"
import {
  DEFAULT_MAX_ACTIVE_UNITS_PER_ITEM_TYPE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TRADE_LOG_ATTEMPTS,
} from "./types.js"
import type {
  BuyListingInput,
  CancelListingInput,
  CreateListingInput,
  ItemPriceSummary,
  Listing,
  ListingFilter,
  PlayerReputation,
  PurchaseReceipt,
  Trade,
} from "./types.js"

// ── Options ──────────────────────────────────────────────────

export interface LedgerLogger {
  info(message: string): void
  warn(message: string): void
  error(message: string, err?: unknown): void
}

const consoleLogger: LedgerLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message, err) => {
    if (err === undefined) console.error(message)
    else console.error(message, err)
  },
}

export interface MarketplaceLedgerOptions {
  store: DocumentStore
  listingsKey?: string           // Default: "listings.json"
  tradesKey?: string             // Default: "completed_trades.json"
  maxAttempts?: number           // Default: 3
  tradeLogAttempts?: number      // Default: 3
  maxActiveUnitsPerItemType?: number // Default: 50
  storeTimeoutMs?: number        // Default: 5000
  clock?: () => Date
  generateId?: () => string
  log?: LedgerLogger
}

const DEFAULT_LISTINGS_KEY = "listings.json"
const DEFAULT_TRADES_KEY = "completed_trades.json"
const DEFAULT_STORE_TIMEOUT_MS = 5000

// ── Internal loop types ──────────────────────────────────────

interface ListingSnapshot {
  repository: ListingRepository
  version: string | null
}

interface PlannedWrite<T> {
  repository: ListingRepository
  value: T
}

/** Outcome of one CAS attempt; the attempt counter lives in the loop. */
type AttemptOutcome<T> =
  | { kind: "committed"; value: T }
  | { kind: "conflict"; snapshot?: ListingSnapshot }
  | { kind: "rejected"; error: MarketplaceError }

interface ListingStep<T> {
  operation: "create" | "buy" | "cancel"
  /** This call's effect, if the snapshot already contains it */
  applied(repository: ListingRepository): T | undefined
  /** Compute the next snapshot, or a terminal business rejection */
  plan(repository: ListingRepository): LedgerResult<PlannedWrite<T>>
  conflictMessage: string
}

interface TradeAppendResult {
  trade: Trade
  recorded: boolean
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0
}

function requireText(field: string, value: string): MarketplaceError | undefined {
  return value.trim() === "" ? validationError(field, `${field} is required`) : undefined
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ── Ledger ───────────────────────────────────────────────────

export class MarketplaceLedger {
  private readonly store: DocumentStore
  private readonly listingsKey: string
  private readonly tradesKey: string
  private readonly maxAttempts: number
  private readonly tradeLogAttempts: number
  private readonly maxUnits: number
  private readonly storeTimeoutMs: number
  private readonly clock: () => Date
  private readonly generateId: () => string
  private readonly log: LedgerLogger

  constructor(options: MarketplaceLedgerOptions) {
    this.store = options.store
    this.listingsKey = options.listingsKey ?? DEFAULT_LISTINGS_KEY
    this.tradesKey = options.tradesKey ?? DEFAULT_TRADES_KEY
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
    this.tradeLogAttempts = Math.max(1, options.tradeLogAttempts ?? DEFAULT_TRADE_LOG_ATTEMPTS)
    this.maxUnits = options.maxActiveUnitsPerItemType ?? DEFAULT_MAX_ACTIVE_UNITS_PER_ITEM_TYPE
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS
    this.clock = options.clock ?? (() => new Date())
    this.generateId = options.generateId ?? (() => ulid())
    this.log = options.log ?? consoleLogger
  }

  // ── Mutations ──────────────────────────────────────────────

  async createListing(input: CreateListingInput): Promise<LedgerResult<Listing>> {
    const invalid =
      requireText("seller_id", input.seller_id) ??
      requireText("seller_name", input.seller_name) ??
      requireText("item_type", input.item_type) ??
      requireText("item_name", input.item_name) ??
      (isPositiveInteger(input.quantity) ? undefined : validationError("quantity", "quantity must be a positive integer")) ??
      (isPositiveInteger(input.asking_price) ? undefined : validationError("asking_price", "asking_price must be a positive integer"))
    if (invalid) return fail(invalid)

    const listing: Listing = {
      listing_id: this.generateId(),
      seller_id: input.seller_id,
      seller_name: input.seller_name,
      item_type: input.item_type,
      item_name: input.item_name,
      quantity: input.quantity,
      asking_price: input.asking_price,
      description: input.description ?? "",
      status: "active",
      created_at: this.now(),
    }

    const result = await this.runListingStep<Listing>({
      operation: "create",
      conflictMessage: "Listings changed concurrently, please retry",
      applied: (repository) => repository.find(listing.listing_id),
      plan: (repository) => {
        const existing = repository.activeQuantity(listing.seller_id, listing.item_type)
        if (existing + listing.quantity > this.maxUnits) {
          return fail(capacityError(listing.item_type, existing, listing.quantity, this.maxUnits))
        }
        return ok({ repository: repository.append(listing), value: listing })
      },
    })

    if (result.ok) {
      this.log.info(
        `[ledger] listing ${listing.listing_id} created by ${listing.seller_id}: ` +
          `${listing.quantity}x ${listing.item_type} for ${listing.asking_price}`,
      )
    }
    return result
  }

  async buyListing(input: BuyListingInput): Promise<LedgerResult<PurchaseReceipt>> {
    const invalid =
      requireText("listing_id", input.listing_id) ??
      requireText("buyer_id", input.buyer_id) ??
      requireText("buyer_name", input.buyer_name) ??
      (input.expected_price === undefined || isPositiveInteger(input.expected_price)
        ? undefined
        : validationError("expected_price", "expected_price must be a positive integer"))
    if (invalid) return fail(invalid)

    const transitionId = this.generateId()
    const soldAt = this.now()

    const sold = await this.runListingStep<Listing>({
      operation: "buy",
      conflictMessage: "Item was purchased by another player",
      applied: (repository) => {
        const listing = repository.find(input.listing_id)
        return listing?.status === "sold" && listing.transition_id === transitionId ? listing : undefined
      },
      plan: (repository) => {
        const listing = repository.findActive(input.listing_id)
        if (!listing) return fail(notFoundError(input.listing_id))
        if (listing.seller_id === input.buyer_id) return fail(selfTradeError(input.listing_id))
        if (input.expected_price !== undefined && input.expected_price !== listing.asking_price) {
          return fail(priceChangedError(input.listing_id, listing.asking_price, input.expected_price))
        }
        const transition = repository.markSold(
          input.listing_id,
          input.buyer_id,
          input.buyer_name,
          soldAt,
          transitionId,
        )
        if (!transition) return fail(notFoundError(input.listing_id))
        return ok({ repository: transition.repository, value: transition.listing })
      },
    })
    if (!sold.ok) return sold

    const listing = sold.value
    this.log.info(
      `[ledger] listing ${listing.listing_id} sold to ${input.buyer_id} for ${listing.asking_price}`,
    )

    const { trade, recorded } = await this.appendTrade({
      trade_id: this.generateId(),
      listing_id: listing.listing_id,
      seller_id: listing.seller_id,
      seller_name: listing.seller_name,
      buyer_id: input.buyer_id,
      buyer_name: input.buyer_name,
      item_type: listing.item_type,
      item_name: listing.item_name,
      quantity: listing.quantity,
      final_price: listing.asking_price,
      completed_at: listing.sold_at ?? soldAt,
    })

    return ok({ listing, trade, trade_recorded: recorded })
  }

  async cancelListing(input: CancelListingInput): Promise<LedgerResult<Listing>> {
    const invalid =
      requireText("listing_id", input.listing_id) ?? requireText("seller_id", input.seller_id)
    if (invalid) return fail(invalid)

    const transitionId = this.generateId()
    const removedAt = this.now()

    const result = await this.runListingStep<Listing>({
      operation: "cancel",
      conflictMessage: "Listing changed concurrently, please retry",
      applied: (repository) => {
        const listing = repository.find(input.listing_id)
        return listing?.status === "removed" && listing.transition_id === transitionId ? listing : undefined
      },
      plan: (repository) => {
        const listing = repository.findActive(input.listing_id)
        if (!listing) return fail(notFoundError(input.listing_id))
        if (listing.seller_id !== input.seller_id) return fail(forbiddenError(input.listing_id))
        const transition = repository.markRemoved(input.listing_id, removedAt, transitionId)
        if (!transition) return fail(notFoundError(input.listing_id))
        return ok({ repository: transition.repository, value: transition.listing })
      },
    })

    if (result.ok) {
      this.log.info(`[ledger] listing ${input.listing_id} removed by ${input.seller_id}`)
    }
    return result
  }

  // ── Queries ────────────────────────────────────────────────

  async listActiveListings(filter: ListingFilter = {}): Promise<LedgerResult<Listing[]>> {
    const snapshot = await this.readListings()
    if (!snapshot.ok) return snapshot
    return ok(snapshot.value.repository.active(filter))
  }

  async tradeHistory(playerId: string): Promise<LedgerResult<Trade[]>> {
    const invalid = requireText("player_id", playerId)
    if (invalid) return fail(invalid)

    const trades = await this.readTradeLog()
    if (!trades.ok) return trades
    return ok(trades.value.repository.forPlayer(playerId))
  }

  async marketPrices(): Promise<LedgerResult<ItemPriceSummary[]>> {
    const trades = await this.readTradeLog()
    if (!trades.ok) return trades
    return ok(summarizePrices(trades.value.repository.all()))
  }

  async playerReputation(playerId: string): Promise<LedgerResult<PlayerReputation>> {
    const invalid = requireText("player_id", playerId)
    if (invalid) return fail(invalid)

    const trades = await this.readTradeLog()
    if (!trades.ok) return trades
    return ok(playerReputation(trades.value.repository.all(), playerId))
  }

  // ── CAS loop ───────────────────────────────────────────────

  private async runListingStep<T>(step: ListingStep<T>): Promise<LedgerResult<T>> {
    let carried: ListingSnapshot | undefined

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let snapshot = carried
      carried = undefined
      if (!snapshot) {
        const read = await this.readListings()
        if (!read.ok) return read
        snapshot = read.value
      }

      const outcome = await this.attempt(step, snapshot)
      switch (outcome.kind) {
        case "committed":
          return ok(outcome.value)
        case "rejected":
          return fail(outcome.error)
        case "conflict":
          carried = outcome.snapshot
          this.log.warn(
            `[ledger] ${step.operation}: version conflict on attempt ${attempt}/${this.maxAttempts}`,
          )
      }
    }

    return fail(conflictError(this.maxAttempts, step.conflictMessage))
  }

  private async attempt<T>(step: ListingStep<T>, snapshot: ListingSnapshot): Promise<AttemptOutcome<T>> {
    const already = step.applied(snapshot.repository)
    if (already !== undefined) return { kind: "committed", value: already }

    const planned = step.plan(snapshot.repository)
    if (!planned.ok) return { kind: "rejected", error: planned.error }

    let written: WriteResult
    try {
      written = await withTimeout(
        this.store.write(
          this.listingsKey,
          encodeListings(planned.value.repository.toArray()),
          snapshot.version,
        ),
        this.storeTimeoutMs,
        "write",
      )
    } catch (err) {
      return this.verifyUnacknowledgedWrite(step, err)
    }

    return written.ok ? { kind: "committed", value: planned.value.value } : { kind: "conflict" }
  }

  /**
   * The write may or may not have landed. Re-read and look for this call's
   * token. A timeout that did not land is a lost race; any other failure that
   * did not land is surfaced as the store being down.
   */
  private async verifyUnacknowledgedWrite<T>(step: ListingStep<T>, cause: unknown): Promise<AttemptOutcome<T>> {
    const timedOut = cause instanceof StoreTimeoutError
    this.log.warn(`[ledger] ${step.operation}: write not acknowledged (${describe(cause)}), verifying`)

    const read = await this.readListings()
    if (!read.ok) {
      return {
        kind: "rejected",
        error: storeUnavailableError("Listing store did not confirm the write", {
          operation: step.operation,
          outcome: "unknown",
        }),
      }
    }

    const applied = step.applied(read.value.repository)
    if (applied !== undefined) {
      this.log.info(`[ledger] ${step.operation}: unacknowledged write had been applied`)
      return { kind: "committed", value: applied }
    }

    if (timedOut) return { kind: "conflict", snapshot: read.value }

    this.log.error(`[ledger] ${step.operation}: listing store write failed`, cause)
    return {
      kind: "rejected",
      error: storeUnavailableError("Listing store unavailable", { operation: step.operation }),
    }
  }

  // ── Trade log ──────────────────────────────────────────────

  /**
   * Best-effort append, idempotent on listing_id. The sale has already
   * committed, so every failure here is logged and reported, never raised.
   */
  private async appendTrade(trade: Trade): Promise<TradeAppendResult> {
    for (let attempt = 1; attempt <= this.tradeLogAttempts; attempt++) {
      const current = await this.readTradeLog()
      if (!current.ok) {
        this.log.error(`[trade-log] cannot read trade log for ${trade.listing_id}: ${current.error.message}`)
        return { trade, recorded: false }
      }

      const existing = current.value.repository.findByListing(trade.listing_id)
      if (existing) return { trade: existing, recorded: true }

      let written: WriteResult
      try {
        written = await withTimeout(
          this.store.write(
            this.tradesKey,
            encodeTrades(current.value.repository.append(trade).all()),
            current.value.version,
          ),
          this.storeTimeoutMs,
          "write",
        )
      } catch (err) {
        // Unacknowledged: the next read shows whether it landed
        this.log.warn(`[trade-log] append for ${trade.listing_id} not acknowledged: ${describe(err)}`)
        continue
      }

      if (written.ok) return { trade, recorded: true }
      this.log.warn(
        `[trade-log] version conflict appending ${trade.listing_id} (attempt ${attempt}/${this.tradeLogAttempts})`,
      )
    }

    // One last look in case the final attempt landed without acknowledgement
    const final = await this.readTradeLog()
    if (final.ok) {
      const existing = final.value.repository.findByListing(trade.listing_id)
      if (existing) return { trade: existing, recorded: true }
    }

    this.log.error(`[trade-log] giving up on trade for listing ${trade.listing_id}`)
    return { trade, recorded: false }
  }

  // ── Reads ──────────────────────────────────────────────────

  private async readListings(): Promise<LedgerResult<ListingSnapshot>> {
    const doc = await this.readDocument(this.listingsKey, "listings")
    if (!doc.ok) return doc
    try {
      return ok({ repository: new ListingRepository(decodeListings(doc.value.body)), version: doc.value.version })
    } catch (err) {
      return fail(this.corruptDocument("listings", err))
    }
  }

  private async readTradeLog(): Promise<LedgerResult<{ repository: TradeRepository; version: string | null }>> {
    const doc = await this.readDocument(this.tradesKey, "trades")
    if (!doc.ok) return doc
    try {
      return ok({ repository: new TradeRepository(decodeTrades(doc.value.body)), version: doc.value.version })
    } catch (err) {
      return fail(this.corruptDocument("trades", err))
    }
  }

  private async readDocument(key: string, document: string): Promise<LedgerResult<VersionedDocument>> {
    try {
      return ok(await withTimeout(this.store.read(key), this.storeTimeoutMs, "read"))
    } catch (err) {
      this.log.error(`[ledger] ${document} read failed: ${describe(err)}`)
      return fail(storeUnavailableError(`${capitalize(document)} store unavailable`, { document }))
    }
  }

  private corruptDocument(document: string, err: unknown): MarketplaceError {
    if (!(err instanceof DocumentCorruptError)) {
      this.log.error(`[ledger] ${document} decode failed`, err)
    } else {
      this.log.error(`[ledger] ${err.message}`)
    }
    return storeUnavailableError(`${capitalize(document)} document is unreadable`, {
      document,
      reason: "corrupt",
    })
  }

  private now(): string {
    return this.clock().toISOString()
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}
