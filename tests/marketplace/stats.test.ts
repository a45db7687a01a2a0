// tests/marketplace/stats.test.ts — Price summary and player reputation aggregates

import { describe, it, expect } from "vitest"
import { playerReputation, summarizePrices } from "../../src/marketplace/stats.js"
import type { Trade } from "../../src/marketplace/types.js"

// ── Helpers ──────────────────────────────────────────────────

let seq = 0

function makeTrade(overrides: Partial<Trade> = {}): Trade {
  seq++
  return {
    trade_id: `T-${seq}`,
    listing_id: `L-${seq}`,
    seller_id: "p-seller",
    seller_name: "Vera",
    buyer_id: "p-buyer",
    buyer_name: "Ori",
    item_type: "debris",
    item_name: "Hull Plating",
    quantity: 1,
    final_price: 100,
    completed_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  }
}

// ── summarizePrices ──────────────────────────────────────────

describe("summarizePrices", () => {
  it("returns nothing for an empty log", () => {
    expect(summarizePrices([])).toEqual([])
  })

  it("aggregates per item and sorts by type then name", () => {
    const trades = [
      makeTrade({ item_type: "upgrade", item_name: "Thruster", final_price: 500, quantity: 1, completed_at: "2026-01-02T00:00:00.000Z" }),
      makeTrade({ final_price: 100, quantity: 3, completed_at: "2026-01-01T00:00:00.000Z" }),
      makeTrade({ final_price: 150, quantity: 2, completed_at: "2026-01-03T00:00:00.000Z" }),
      makeTrade({ final_price: 90, quantity: 4, completed_at: "2026-01-02T00:00:00.000Z" }),
      makeTrade({ item_name: "Antenna", final_price: 40, quantity: 1, completed_at: "2026-01-04T00:00:00.000Z" }),
    ]

    expect(summarizePrices(trades)).toEqual([
      {
        item_type: "debris",
        item_name: "Antenna",
        trade_count: 1,
        total_volume: 1,
        average_price: 40,
        min_price: 40,
        max_price: 40,
        last_price: 40,
        last_traded_at: "2026-01-04T00:00:00.000Z",
      },
      {
        item_type: "debris",
        item_name: "Hull Plating",
        trade_count: 3,
        total_volume: 9,
        average_price: 113.33,
        min_price: 90,
        max_price: 150,
        last_price: 150,
        last_traded_at: "2026-01-03T00:00:00.000Z",
      },
      {
        item_type: "upgrade",
        item_name: "Thruster",
        trade_count: 1,
        total_volume: 1,
        average_price: 500,
        min_price: 500,
        max_price: 500,
        last_price: 500,
        last_traded_at: "2026-01-02T00:00:00.000Z",
      },
    ])
  })

  it("takes the later append as last price on a timestamp tie", () => {
    const [summary] = summarizePrices([
      makeTrade({ final_price: 10 }),
      makeTrade({ final_price: 20 }),
    ])
    expect(summary.last_price).toBe(20)
    expect(summary.average_price).toBe(15)
  })
})

// ── playerReputation ─────────────────────────────────────────

describe("playerReputation", () => {
  it("zeroes a player with no trades", () => {
    expect(playerReputation([makeTrade()], "p-nobody")).toEqual({
      player_id: "p-nobody",
      player_name: null,
      trades_as_seller: 0,
      trades_as_buyer: 0,
      credits_earned: 0,
      credits_spent: 0,
      total_credits_traded: 0,
      first_trade_at: null,
      last_trade_at: null,
    })
  })

  it("counts both sides and uses the most recent name", () => {
    const trades = [
      makeTrade({ seller_id: "p-vera", seller_name: "Vera", final_price: 200, completed_at: "2026-01-02T00:00:00.000Z" }),
      makeTrade({ buyer_id: "p-vera", buyer_name: "Vera the Bold", seller_id: "p-kai", final_price: 75, completed_at: "2026-01-05T00:00:00.000Z" }),
      makeTrade({ seller_id: "p-vera", seller_name: "Vera", final_price: 50, completed_at: "2026-01-01T00:00:00.000Z" }),
      makeTrade({ seller_id: "p-kai", buyer_id: "p-ori", completed_at: "2026-01-09T00:00:00.000Z" }),
    ]

    expect(playerReputation(trades, "p-vera")).toEqual({
      player_id: "p-vera",
      player_name: "Vera the Bold",
      trades_as_seller: 2,
      trades_as_buyer: 1,
      credits_earned: 250,
      credits_spent: 75,
      total_credits_traded: 325,
      first_trade_at: "2026-01-01T00:00:00.000Z",
      last_trade_at: "2026-01-05T00:00:00.000Z",
    })
  })
})
