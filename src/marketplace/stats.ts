// src/marketplace/stats.ts — Read-only aggregates over the trade log
//
// Pure functions: the ledger reads the trade collection once and hands the
// array in. Nothing here is persisted; the figures are recomputed per request.

import type { ItemPriceSummary, PlayerReputation, Trade } from "./types.js"

/** Round to cents. */
function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/** Per-item price summary, sorted by item_type then item_name. */
export function summarizePrices(trades: readonly Trade[]): ItemPriceSummary[] {
  const groups = new Map<string, Trade[]>()
  for (const trade of trades) {
    const key = `${trade.item_type}\u0000${trade.item_name}`
    const group = groups.get(key)
    if (group) group.push(trade)
    else groups.set(key, [trade])
  }

  const summaries: ItemPriceSummary[] = []
  for (const group of groups.values()) {
    let total = 0
    let volume = 0
    let min = Infinity
    let max = -Infinity
    let last = group[0]
    for (const trade of group) {
      total += trade.final_price
      volume += trade.quantity
      min = Math.min(min, trade.final_price)
      max = Math.max(max, trade.final_price)
      // Later append wins a timestamp tie
      if (trade.completed_at >= last.completed_at) last = trade
    }
    summaries.push({
      item_type: last.item_type,
      item_name: last.item_name,
      trade_count: group.length,
      total_volume: volume,
      average_price: round2(total / group.length),
      min_price: min,
      max_price: max,
      last_price: last.final_price,
      last_traded_at: last.completed_at,
    })
  }

  return summaries.sort((a, b) => {
    if (a.item_type !== b.item_type) return a.item_type < b.item_type ? -1 : 1
    if (a.item_name !== b.item_name) return a.item_name < b.item_name ? -1 : 1
    return 0
  })
}

/** Trading reputation for one player. Unknown players get zeroed counters. */
export function playerReputation(trades: readonly Trade[], playerId: string): PlayerReputation {
  const reputation: PlayerReputation = {
    player_id: playerId,
    player_name: null,
    trades_as_seller: 0,
    trades_as_buyer: 0,
    credits_earned: 0,
    credits_spent: 0,
    total_credits_traded: 0,
    first_trade_at: null,
    last_trade_at: null,
  }

  for (const trade of trades) {
    const asSeller = trade.seller_id === playerId
    const asBuyer = trade.buyer_id === playerId
    if (!asSeller && !asBuyer) continue

    if (asSeller) {
      reputation.trades_as_seller += 1
      reputation.credits_earned += trade.final_price
    }
    if (asBuyer) {
      reputation.trades_as_buyer += 1
      reputation.credits_spent += trade.final_price
    }

    if (reputation.first_trade_at === null || trade.completed_at < reputation.first_trade_at) {
      reputation.first_trade_at = trade.completed_at
    }
    if (reputation.last_trade_at === null || trade.completed_at >= reputation.last_trade_at) {
      reputation.last_trade_at = trade.completed_at
      reputation.player_name = asSeller ? trade.seller_name : trade.buyer_name
    }
  }

  reputation.total_credits_traded = reputation.credits_earned + reputation.credits_spent
  return reputation
}
