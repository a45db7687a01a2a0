// src/marketplace/listing-repository.ts — Immutable view over a decoded listings snapshot
//
// Every mutation returns a new repository; the snapshot it was built from is
// never touched, so a ledger attempt that loses its CAS race can simply drop
// the result and re-read.

import type { Listing, ListingFilter } from "./types.js"

/** Result of finalizing a listing: the new snapshot and the updated record. */
export interface ListingTransition {
  repository: ListingRepository
  listing: Listing
}

/** Newest first; equal timestamps fall back to listing_id, also descending. */
function compareNewestFirst(a: Listing, b: Listing): number {
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1
  if (a.listing_id === b.listing_id) return 0
  return a.listing_id < b.listing_id ? 1 : -1
}

export class ListingRepository {
  private readonly listings: readonly Listing[]

  constructor(listings: readonly Listing[] = []) {
    this.listings = listings
  }

  /** Active listings, newest first, optionally narrowed by seller and item type. */
  active(filter: ListingFilter = {}): Listing[] {
    return this.listings
      .filter((l) => l.status === "active")
      .filter((l) => filter.seller_id === undefined || l.seller_id === filter.seller_id)
      .filter((l) => filter.item_type === undefined || l.item_type === filter.item_type)
      .sort(compareNewestFirst)
  }

  findActive(listingId: string): Listing | undefined {
    return this.listings.find((l) => l.listing_id === listingId && l.status === "active")
  }

  /** Any listing with this id, whatever its status. */
  find(listingId: string): Listing | undefined {
    return this.listings.find((l) => l.listing_id === listingId)
  }

  /** Units the seller currently has listed for one item type. */
  activeQuantity(sellerId: string, itemType: string): number {
    let total = 0
    for (const l of this.listings) {
      if (l.status === "active" && l.seller_id === sellerId && l.item_type === itemType) {
        total += l.quantity
      }
    }
    return total
  }

  append(listing: Listing): ListingRepository {
    return new ListingRepository([...this.listings, listing])
  }

  /** active → sold. Undefined when the listing is absent or already final. */
  markSold(
    listingId: string,
    buyerId: string,
    buyerName: string,
    now: string,
    transitionId: string,
  ): ListingTransition | undefined {
    return this.finalize(listingId, (l) => ({
      ...l,
      status: "sold",
      buyer_id: buyerId,
      buyer_name: buyerName,
      sold_at: now,
      transition_id: transitionId,
    }))
  }

  /** active → removed. Undefined when the listing is absent or already final. */
  markRemoved(listingId: string, now: string, transitionId: string): ListingTransition | undefined {
    return this.finalize(listingId, (l) => ({
      ...l,
      status: "removed",
      removed_at: now,
      transition_id: transitionId,
    }))
  }

  /** Every listing in stored order, for encoding. */
  toArray(): Listing[] {
    return [...this.listings]
  }

  get size(): number {
    return this.listings.length
  }

  private finalize(
    listingId: string,
    transition: (listing: Listing) => Listing,
  ): ListingTransition | undefined {
    const index = this.listings.findIndex((l) => l.listing_id === listingId && l.status === "active")
    if (index === -1) return undefined

    const updated = transition(this.listings[index])
    const next = [...this.listings]
    next[index] = updated
    return { repository: new ListingRepository(next), listing: updated }
  }
}
