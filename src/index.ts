/**
 * tfvar-sync
 *
 * Library entry point: everything the CLI is built from.
 */

export * from './lib/terraform'
export * from './lib/outputs'
export * from './lib/sync'
export {
  RateLimiter,
  RATE_LIMITS,
  createTerraformRateLimiter,
  waitForToken,
  sleep,
} from './lib/rate-limit'
export type { RateLimitConfig, RateLimitResult, RateLimiterOptions, Sleep } from './lib/rate-limit'
export { InputError } from './lib/errors'
export type { InputErrorCode } from './lib/errors'
export { loadConnectionConfig, toApiRoot } from './lib/config'
export { createLogger, setLogLevel } from './lib/logger'
export type { LogLevel } from './lib/logger'
export { main } from './cli/main'
