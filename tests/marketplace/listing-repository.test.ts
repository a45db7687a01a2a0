// tests/marketplace/listing-repository.test.ts — Immutable listing snapshot operations

import { describe, it, expect } from "vitest"
import { ListingRepository } from "../../src/marketplace/listing-repository.js"
import { TradeRepository } from "../../src/marketplace/trade-repository.js"
import type { Trade } from "../../src/marketplace/types.js"
import { makeListing } from "../helpers/exchange.js"

function makeTrade(overrides: Partial<Trade> = {}): Trade {
  return {
    trade_id: "T-1",
    listing_id: "L-1",
    seller_id: "p-seller",
    seller_name: "Vera",
    buyer_id: "p-buyer",
    buyer_name: "Ori",
    item_type: "debris",
    item_name: "Hull Plating",
    quantity: 5,
    final_price: 120,
    completed_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  }
}

describe("ListingRepository", () => {
  it("orders active listings newest first, breaking ties by listing id", () => {
    const repo = new ListingRepository([
      makeListing({ listing_id: "L-a", created_at: "2026-01-01T00:00:00.000Z" }),
      makeListing({ listing_id: "L-b", created_at: "2026-01-02T00:00:00.000Z" }),
      makeListing({ listing_id: "L-c", created_at: "2026-01-01T00:00:00.000Z" }),
      makeListing({ listing_id: "L-d", status: "sold", created_at: "2026-01-03T00:00:00.000Z" }),
    ])

    expect(repo.active().map((l) => l.listing_id)).toEqual(["L-b", "L-c", "L-a"])
  })

  it("finds only active listings with findActive", () => {
    const repo = new ListingRepository([
      makeListing({ listing_id: "L-1" }),
      makeListing({ listing_id: "L-2", status: "removed" }),
    ])

    expect(repo.findActive("L-1")?.listing_id).toBe("L-1")
    expect(repo.findActive("L-2")).toBeUndefined()
    expect(repo.find("L-2")?.status).toBe("removed")
  })

  it("sums active units per seller and item type", () => {
    const repo = new ListingRepository([
      makeListing({ listing_id: "L-1", quantity: 10 }),
      makeListing({ listing_id: "L-2", quantity: 7 }),
      makeListing({ listing_id: "L-3", quantity: 20, status: "sold" }),
      makeListing({ listing_id: "L-4", quantity: 4, item_type: "upgrade" }),
      makeListing({ listing_id: "L-5", quantity: 9, seller_id: "p-other" }),
    ])

    expect(repo.activeQuantity("p-seller", "debris")).toBe(17)
    expect(repo.activeQuantity("p-seller", "upgrade")).toBe(4)
    expect(repo.activeQuantity("p-nobody", "debris")).toBe(0)
  })

  it("returns a new snapshot from append and leaves the source alone", () => {
    const repo = new ListingRepository([makeListing({ listing_id: "L-1" })])
    const next = repo.append(makeListing({ listing_id: "L-2" }))

    expect(repo.size).toBe(1)
    expect(next.size).toBe(2)
  })

  it("marks a listing sold without mutating the source snapshot", () => {
    const source = makeListing()
    const repo = new ListingRepository([source])

    const transition = repo.markSold("L-1", "p-buyer", "Ori", "2026-01-05T00:00:00.000Z", "tx-1")

    expect(transition?.listing).toEqual({
      ...source,
      status: "sold",
      buyer_id: "p-buyer",
      buyer_name: "Ori",
      sold_at: "2026-01-05T00:00:00.000Z",
      transition_id: "tx-1",
    })
    expect(transition?.repository.findActive("L-1")).toBeUndefined()
    expect(repo.findActive("L-1")).toEqual(source)
    expect(source.status).toBe("active")
  })

  it("marks a listing removed", () => {
    const repo = new ListingRepository([makeListing()])
    const transition = repo.markRemoved("L-1", "2026-01-05T00:00:00.000Z", "tx-2")

    expect(transition?.listing).toMatchObject({
      status: "removed",
      removed_at: "2026-01-05T00:00:00.000Z",
      transition_id: "tx-2",
    })
  })

  it("refuses to finalize a listing twice", () => {
    const repo = new ListingRepository([makeListing({ status: "sold" })])

    expect(repo.markSold("L-1", "p-buyer", "Ori", "2026-01-05T00:00:00.000Z", "tx-1")).toBeUndefined()
    expect(repo.markRemoved("L-1", "2026-01-05T00:00:00.000Z", "tx-2")).toBeUndefined()
    expect(repo.markRemoved("L-missing", "2026-01-05T00:00:00.000Z", "tx-3")).toBeUndefined()
  })
})

describe("TradeRepository", () => {
  it("returns trades for either side of the deal, newest first", () => {
    const repo = new TradeRepository([
      makeTrade({ trade_id: "T-1", completed_at: "2026-01-01T00:00:00.000Z" }),
      makeTrade({ trade_id: "T-2", seller_id: "p-buyer", buyer_id: "p-third", completed_at: "2026-01-03T00:00:00.000Z" }),
      makeTrade({ trade_id: "T-3", seller_id: "p-x", buyer_id: "p-y", completed_at: "2026-01-02T00:00:00.000Z" }),
    ])

    expect(repo.forPlayer("p-buyer").map((t) => t.trade_id)).toEqual(["T-2", "T-1"])
    expect(repo.forPlayer("p-seller").map((t) => t.trade_id)).toEqual(["T-1"])
    expect(repo.forPlayer("p-none")).toEqual([])
  })

  it("appends without touching the source snapshot", () => {
    const repo = new TradeRepository()
    const next = repo.append(makeTrade())

    expect(repo.all()).toEqual([])
    expect(next.all()).toEqual([makeTrade()])
    expect(next.findByListing("L-1")?.trade_id).toBe("T-1")
    expect(next.findByListing("L-2")).toBeUndefined()
  })
})
