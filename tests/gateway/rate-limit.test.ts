// tests/gateway/rate-limit.test.ts — Per-operation trade budgets, client IPs, origin policy

import { describe, it, expect } from "vitest"
import { Hono } from "hono"
import { TradeRateLimiter, getClientIp, rateLimitedError } from "../../src/gateway/rate-limit.js"
import { compileOriginPolicy } from "../../src/gateway/cors.js"

function makeLimiter(now: () => number) {
  return new TradeRateLimiter(
    { windowMs: 10_000, limits: { create_listing: 2, buy_listing: 1, cancel_listing: 3 } },
    now,
  )
}

describe("TradeRateLimiter", () => {
  it("spends each operation's budget independently", () => {
    const limiter = makeLimiter(() => 0)

    expect(limiter.consume("buy_listing", "1.2.3.4")).toEqual({
      allowed: true,
      limit: 1,
      remaining: 0,
      resetAt: 10_000,
    })
    expect(limiter.consume("buy_listing", "1.2.3.4").allowed).toBe(false)

    // Buying ran dry; creating and other clients are untouched
    expect(limiter.consume("create_listing", "1.2.3.4").allowed).toBe(true)
    expect(limiter.consume("buy_listing", "5.6.7.8").allowed).toBe(true)
  })

  it("reports when the window resets", () => {
    let now = 1_000
    const limiter = makeLimiter(() => now)
    limiter.consume("create_listing", "ip")
    limiter.consume("create_listing", "ip")

    now = 4_000
    expect(limiter.consume("create_listing", "ip")).toEqual({
      allowed: false,
      limit: 2,
      remaining: 0,
      resetAt: 11_000,
      retryAfterMs: 7_000,
    })

    now = 11_000
    expect(limiter.consume("create_listing", "ip")).toMatchObject({ allowed: true, remaining: 1, resetAt: 21_000 })
  })

  it("sweeps expired windows only", () => {
    let now = 0
    const limiter = makeLimiter(() => now)
    limiter.consume("buy_listing", "a")
    now = 6_000
    limiter.consume("cancel_listing", "a")

    now = 12_000
    expect(limiter.sweep()).toBe(1)
    expect(limiter.trackedWindows).toBe(1)
  })
})

describe("rateLimitedError", () => {
  it("names the operation and the wait", () => {
    expect(rateLimitedError("buy_listing", 7_200).toJSON()).toEqual({
      error: "Too many buy_listing requests, retry in 8s",
      code: "RATE_LIMITED",
      operation: "buy_listing",
      retry_after_ms: 7_200,
    })
  })
})

describe("getClientIp", () => {
  async function ipFor(headers: Record<string, string>, trustProxy: boolean): Promise<string> {
    const app = new Hono()
    app.get("/", (c) => c.text(getClientIp(c, trustProxy)))
    const res = await app.request("/", { headers })
    return res.text()
  }

  it("uses the first forwarded address only when proxies are trusted", async () => {
    expect(await ipFor({ "X-Forwarded-For": "9.9.9.9, 10.0.0.1" }, true)).toBe("9.9.9.9")
    expect(await ipFor({ "X-Forwarded-For": "9.9.9.9" }, false)).toBe("unknown")
  })
})

describe("compileOriginPolicy", () => {
  it("matches exact origins and subdomain wildcards", () => {
    const isAllowed = compileOriginPolicy(["https://play.salvage.test", "https://*.fleet.test"])

    expect(isAllowed("https://play.salvage.test")).toBe(true)
    expect(isAllowed("https://a.fleet.test")).toBe(true)
    expect(isAllowed("https://deep.a.fleet.test")).toBe(true)
    expect(isAllowed("https://fleet.test")).toBe(false)
    expect(isAllowed("http://a.fleet.test")).toBe(false)
    expect(isAllowed("https://fleet.test.evil.test")).toBe(false)
    expect(isAllowed("https://other.salvage.test")).toBe(false)
  })

  it("rejects malformed origins even when everything is allowed", () => {
    const isAllowed = compileOriginPolicy(["*"])
    expect(isAllowed("https://anything.test")).toBe(true)
    expect(isAllowed("not a url")).toBe(false)
  })

  it("refuses wildcards outside the leading subdomain label", () => {
    expect(() => compileOriginPolicy(["https://play.*.test"]))
      .toThrow('EXCHANGE_CORS_ORIGINS: unsupported wildcard in "https://play.*.test"')
  })
})
