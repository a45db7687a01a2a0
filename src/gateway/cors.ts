// src/gateway/cors.ts — CORS headers and preflight handling
//
// Caller-supplied player ids are trusted, so there is no auth layer; the
// gateway only decides which game clients (browser origins) may call it.

import type { Context, Next } from "hono"
import type { ExchangeConfig } from "../config.js"

type OriginRule =
  | { kind: "any" }
  | { kind: "exact"; origin: string }
  | { kind: "subdomain"; protocol: string; suffix: string; port: string }

/** Headers a game client reads off marketplace responses */
const EXPOSED_HEADERS = "Retry-After, X-RateLimit-Limit, X-RateLimit-Remaining, X-RateLimit-Reset"

function parseRule(pattern: string): OriginRule {
  if (pattern === "*") return { kind: "any" }

  // "https://*.example.com" admits any subdomain, at any depth, of example.com
  const wildcard = /^([a-z][a-z0-9+.-]*:)\/\/\*\.(.+)$/i.exec(pattern)
  if (wildcard) {
    const [, protocol = "", rest = ""] = wildcard
    const url = new URL(`${protocol}//${rest}`)
    return { kind: "subdomain", protocol: url.protocol, suffix: `.${url.hostname}`, port: url.port }
  }

  if (pattern.includes("*")) {
    throw new Error(`EXCHANGE_CORS_ORIGINS: unsupported wildcard in "${pattern}"`)
  }
  return { kind: "exact", origin: new URL(pattern).origin }
}

/** Compile the allow-list once; the returned matcher rejects malformed origins. */
export function compileOriginPolicy(patterns: string[]): (origin: string) => boolean {
  const rules = patterns.map(parseRule)

  return (origin) => {
    let url: URL
    try {
      url = new URL(origin)
    } catch {
      return false
    }
    return rules.some((rule) => {
      switch (rule.kind) {
        case "any":
          return true
        case "exact":
          return url.origin === rule.origin
        case "subdomain":
          return url.protocol === rule.protocol
            && url.port === rule.port
            && url.hostname.endsWith(rule.suffix)
      }
    })
  }
}

export function corsMiddleware(config: Pick<ExchangeConfig, "auth">) {
  const isAllowed = compileOriginPolicy(config.auth.corsOrigins)

  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin")

    if (origin && isAllowed(origin)) {
      c.header("Access-Control-Allow-Origin", origin)
      c.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS")
      c.header("Access-Control-Allow-Headers", "Content-Type")
      c.header("Access-Control-Expose-Headers", EXPOSED_HEADERS)
      c.header("Access-Control-Max-Age", "600")
      c.header("Vary", "Origin")
    }

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204)
    }

    return next()
  }
}
