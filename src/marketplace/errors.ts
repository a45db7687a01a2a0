// src/marketplace/errors.ts — Typed marketplace errors and ledger results

/** Error codes surfaced by the marketplace ledger */
export type MarketplaceErrorCode =
  | "VALIDATION_FAILED"
  | "CAPACITY_EXCEEDED"
  | "NOT_FOUND"
  | "SELF_TRADE"
  | "FORBIDDEN"
  | "PRICE_CHANGED"
  | "CONFLICT"
  | "RATE_LIMITED"
  | "STORE_UNAVAILABLE"

/**
 * Typed error for every business rejection and store failure.
 * `details` carries the structured fields a client needs to explain the
 * rejection (current vs expected price, existing vs max quantity, ...).
 */
export class MarketplaceError extends Error {
  readonly name = "MarketplaceError"
  readonly code: MarketplaceErrorCode
  readonly details: Record<string, unknown>

  constructor(code: MarketplaceErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.code = code
    this.details = details
  }

  /** Only CAS exhaustion is worth retrying at a higher level. */
  get retryable(): boolean {
    return this.code === "CONFLICT"
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      ...this.details,
    }
  }
}

// ── Constructors ─────────────────────────────────────────────

export function validationError(field: string, message: string): MarketplaceError {
  return new MarketplaceError("VALIDATION_FAILED", message, { field })
}

export function capacityError(
  itemType: string,
  existing: number,
  requested: number,
  max: number,
): MarketplaceError {
  return new MarketplaceError(
    "CAPACITY_EXCEEDED",
    `Listing cap exceeded for ${itemType}: ${existing} active + ${requested} requested > ${max}`,
    {
      item_type: itemType,
      existing_quantity: existing,
      requested_quantity: requested,
      max_quantity: max,
    },
  )
}

export function notFoundError(listingId: string): MarketplaceError {
  return new MarketplaceError("NOT_FOUND", "Listing not found or already sold", {
    listing_id: listingId,
  })
}

export function selfTradeError(listingId: string): MarketplaceError {
  return new MarketplaceError("SELF_TRADE", "Cannot buy your own listing", {
    listing_id: listingId,
  })
}

export function forbiddenError(listingId: string): MarketplaceError {
  return new MarketplaceError("FORBIDDEN", "Only the seller can cancel this listing", {
    listing_id: listingId,
  })
}

export function priceChangedError(
  listingId: string,
  currentPrice: number,
  expectedPrice: number,
): MarketplaceError {
  return new MarketplaceError(
    "PRICE_CHANGED",
    `Price changed: listing asks ${currentPrice}, expected ${expectedPrice}`,
    {
      listing_id: listingId,
      current_price: currentPrice,
      expected_price: expectedPrice,
    },
  )
}

export function conflictError(attempts: number, message: string): MarketplaceError {
  return new MarketplaceError("CONFLICT", message, { attempts })
}

export function storeUnavailableError(
  message: string,
  details: Record<string, unknown> = {},
): MarketplaceError {
  return new MarketplaceError("STORE_UNAVAILABLE", message, details)
}

// ── Results ──────────────────────────────────────────────────

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MarketplaceError }

export function ok<T>(value: T): LedgerResult<T> {
  return { ok: true, value }
}

export function fail<T>(error: MarketplaceError): LedgerResult<T> {
  return { ok: false, error }
}
