// src/marketplace/trade-repository.ts — Append-only view over the trade log snapshot

import type { Trade } from "./types.js"

function newestFirst(a: Trade, b: Trade): number {
  if (a.completed_at !== b.completed_at) return a.completed_at < b.completed_at ? 1 : -1
  if (a.trade_id === b.trade_id) return 0
  return a.trade_id < b.trade_id ? 1 : -1
}

export class TradeRepository {
  private readonly trades: readonly Trade[]

  constructor(trades: readonly Trade[] = []) {
    this.trades = trades
  }

  append(trade: Trade): TradeRepository {
    return new TradeRepository([...this.trades, trade])
  }

  /** Trades where the player sold or bought, newest first. */
  forPlayer(playerId: string): Trade[] {
    return this.trades
      .filter((t) => t.seller_id === playerId || t.buyer_id === playerId)
      .sort(newestFirst)
  }

  findByListing(listingId: string): Trade | undefined {
    return this.trades.find((t) => t.listing_id === listingId)
  }

  /** Every trade in append order. */
  all(): Trade[] {
    return [...this.trades]
  }
}
