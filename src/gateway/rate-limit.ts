// src/gateway/rate-limit.ts — Per-client budgets for the mutating marketplace operations
//
// Each (operation, client) pair gets its own fixed window, so a client
// hammering buy does not use up its create budget. Reads are never limited.

import type { Context, MiddlewareHandler } from "hono"
import type { ExchangeConfig, LimitedOperation } from "../config.js"
import { MarketplaceError } from "../marketplace/errors.js"

export type RateLimitBudget = ExchangeConfig["auth"]["rateLimiting"]

export type RateDecision =
  | { allowed: true; limit: number; remaining: number; resetAt: number }
  | { allowed: false; limit: number; remaining: 0; resetAt: number; retryAfterMs: number }

interface Window {
  startedAt: number
  used: number
}

export class TradeRateLimiter {
  private windows = new Map<string, Window>()

  constructor(
    private readonly budget: RateLimitBudget,
    private readonly now: () => number = Date.now,
  ) {}

  /** Spend one unit of `operation` for `client`. */
  consume(operation: LimitedOperation, client: string): RateDecision {
    const now = this.now()
    const limit = this.budget.limits[operation]
    const key = `${operation}:${client}`

    let window = this.windows.get(key)
    if (!window || now - window.startedAt >= this.budget.windowMs) {
      window = { startedAt: now, used: 0 }
      this.windows.set(key, window)
    }

    const resetAt = window.startedAt + this.budget.windowMs
    if (window.used >= limit) {
      return { allowed: false, limit, remaining: 0, resetAt, retryAfterMs: resetAt - now }
    }

    window.used++
    return { allowed: true, limit, remaining: limit - window.used, resetAt }
  }

  /** Drop windows that have expired; returns how many were removed. */
  sweep(): number {
    const now = this.now()
    let removed = 0
    for (const [key, window] of this.windows) {
      if (now - window.startedAt >= this.budget.windowMs) {
        this.windows.delete(key)
        removed++
      }
    }
    return removed
  }

  get trackedWindows(): number {
    return this.windows.size
  }
}

/**
 * Extract client IP. Proxy headers are only trusted when configured;
 * otherwise the Node socket address is used.
 */
export function getClientIp(c: Context, trustProxy = false): string {
  if (trustProxy) {
    const xff = c.req.header("X-Forwarded-For")?.split(",")[0]?.trim()
    if (xff) return xff
    const realIp = c.req.header("X-Real-IP")
    if (realIp) return realIp
  }
  // @hono/node-server exposes the IncomingMessage as env.incoming
  const remote: unknown = c.env?.incoming?.socket?.remoteAddress
  return typeof remote === "string" && remote ? remote : "unknown"
}

export function rateLimitedError(operation: LimitedOperation, retryAfterMs: number): MarketplaceError {
  const seconds = Math.ceil(retryAfterMs / 1000)
  return new MarketplaceError("RATE_LIMITED", `Too many ${operation} requests, retry in ${seconds}s`, {
    operation,
    retry_after_ms: retryAfterMs,
  })
}

export interface OperationLimit {
  limiter: TradeRateLimiter
  trustProxy: boolean
}

/**
 * Route middleware charging one unit of `operation`. Rejections go through
 * `reject` so they share the marketplace error envelope.
 */
export function limitOperation(
  options: OperationLimit,
  operation: LimitedOperation,
  reject: (c: Context, error: MarketplaceError) => Response,
): MiddlewareHandler {
  return async (c, next) => {
    const decision = options.limiter.consume(operation, getClientIp(c, options.trustProxy))

    c.header("X-RateLimit-Limit", String(decision.limit))
    c.header("X-RateLimit-Remaining", String(decision.remaining))
    c.header("X-RateLimit-Reset", String(Math.ceil(decision.resetAt / 1000)))

    if (!decision.allowed) {
      c.header("Retry-After", String(Math.ceil(decision.retryAfterMs / 1000)))
      return reject(c, rateLimitedError(operation, decision.retryAfterMs))
    }
    await next()
  }
}
