/**
 * Rate Limiting Service
 *
 * Token bucket that bounds outbound Terraform API requests to a fixed number
 * per window. One instance is created per CLI run and handed to every
 * component that talks to the API, so all of them draw from the same bucket.
 *
 * `acquire()` never blocks. Callers that must wait go through `waitForToken()`,
 * which sleeps for the advertised retry delay and tries again.
 */

import { RATE_LIMIT } from '../constants'

// =============================================================================
// Types
// =============================================================================

export interface RateLimitConfig {
  /** Maximum number of requests allowed in the window */
  maxRequests: number
  /** Window size in milliseconds */
  windowMs: number
}

export interface RateLimitResult {
  /** Whether a token was consumed */
  ok: boolean
  /** Time in ms until a token becomes available (0 when ok) */
  retryAfterMs: number
  /** Tokens left in the current window */
  remaining: number
}

export interface RateLimiterOptions extends RateLimitConfig {
  /** Clock source, overridable in tests */
  now?: () => number
}

export type Sleep = (ms: number) => Promise<void>

// =============================================================================
// Default Configurations
// =============================================================================

export const RATE_LIMITS = {
  /** Terraform API: 20 requests per second */
  TERRAFORM_API: {
    maxRequests: RATE_LIMIT.MAX_REQUESTS_PER_SECOND,
    windowMs: RATE_LIMIT.WINDOW_MS,
  },
} as const satisfies Record<string, RateLimitConfig>

// =============================================================================
// Rate Limiter Class
// =============================================================================

export class RateLimiter {
  readonly maxRequests: number
  readonly windowMs: number
  private readonly now: () => number
  private tokens: number
  private windowStart: number

  constructor(options: RateLimiterOptions = RATE_LIMITS.TERRAFORM_API) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`)
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`)
    }

    this.maxRequests = options.maxRequests
    this.windowMs = options.windowMs
    this.now = options.now ?? Date.now
    this.tokens = options.maxRequests
    this.windowStart = this.now()
  }

  /**
   * Take a token if one is available.
   */
  acquire(): RateLimitResult {
    const now = this.now()
    this.refill(now)

    if (this.tokens > 0) {
      this.tokens--
      return { ok: true, retryAfterMs: 0, remaining: this.tokens }
    }

    return {
      ok: false,
      retryAfterMs: Math.max(1, this.windowStart + this.windowMs - now),
      remaining: 0,
    }
  }

  /**
   * Tokens available right now, without consuming one.
   */
  peek(): number {
    this.refill(this.now())
    return this.tokens
  }

  private refill(now: number): void {
    const elapsed = now - this.windowStart
    if (elapsed < this.windowMs) return

    const windows = Math.floor(elapsed / this.windowMs)
    this.windowStart += windows * this.windowMs
    this.tokens = this.maxRequests
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Wait until the limiter hands out a token.
 *
 * Returns the number of backoffs taken, which is 0 when the token was
 * available immediately.
 */
export async function waitForToken(
  limiter: RateLimiter,
  wait: Sleep = sleep,
  onBackoff?: (retryAfterMs: number) => void
): Promise<number> {
  let backoffs = 0
  for (;;) {
    const result = limiter.acquire()
    if (result.ok) return backoffs

    backoffs++
    onBackoff?.(result.retryAfterMs)
    await wait(result.retryAfterMs)
  }
}

/**
 * Limiter for a Terraform API session.
 */
export function createTerraformRateLimiter(now?: () => number): RateLimiter {
  return new RateLimiter({ ...RATE_LIMITS.TERRAFORM_API, now })
}
