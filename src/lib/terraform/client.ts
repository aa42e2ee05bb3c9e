/**
 * Terraform API Client
 *
 * Low-level request helper shared by the variables client and the workspace
 * lookup. Every request:
 * - waits for a token from the shared RateLimiter
 * - carries the bearer token and the JSON:API content type
 * - is aborted after the configured timeout
 * - must answer with the one status code the caller expects
 *
 * The API token is never written to logs or error messages.
 */

import type { z } from 'zod'
import { MAX_ERROR_MESSAGE_LENGTH, TERRAFORM_API } from '../constants'
import { createLogger } from '../logger'
import { sleep as defaultSleep, waitForToken, type RateLimiter, type Sleep } from '../rate-limit'
import { formatZodError } from '../validations/schemas'

const log = createLogger('terraform-api')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TerraformConnection {
  /** API root, e.g. https://app.terraform.io/api/v2 */
  baseUrl: string
  organizationName: string
  token: string
  /** Per-request timeout (ms) */
  timeoutMs?: number
}

/** The subset of a fetch Response the client reads */
export type HttpResponse = Pick<Response, 'ok' | 'status' | 'statusText' | 'text'>

export type FetchLike = (url: string, init: RequestInit) => Promise<HttpResponse>

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE'

export interface TerraformClientOptions {
  connection: TerraformConnection
  limiter: RateLimiter
  /** Defaults to the global fetch */
  fetch?: FetchLike
  /** Used while waiting for the rate limiter; defaults to setTimeout */
  sleep?: Sleep
}

export interface RequestOptions {
  method?: HttpMethod
  body?: unknown
  /** The only status code treated as success */
  expectedStatus: number
}

/** Error classifications, used to tell systemic failures from per-item ones */
export type ApiErrorKind =
  | 'auth'
  | 'not_found'
  | 'rate_limited'
  | 'server'
  | 'unexpected_status'
  | 'invalid_response'
  | 'timeout'
  | 'network'

export class ApiError extends Error {
  readonly kind: ApiErrorKind
  readonly statusCode: number | null

  constructor(message: string, kind: ApiErrorKind, statusCode: number | null = null) {
    super(message)
    this.name = 'ApiError'
    this.kind = kind
    this.statusCode = statusCode
  }
}

// ---------------------------------------------------------------------------
// Secret-safe error sanitization
// ---------------------------------------------------------------------------

/**
 * Strip the API token and any bearer header from a string, and truncate it.
 */
export function sanitizeError(raw: string, token?: string): string {
  let cleaned = raw

  if (token && cleaned.includes(token)) {
    cleaned = cleaned.replaceAll(token, '[REDACTED]')
  }

  cleaned = cleaned.replace(/(?:Authorization:?\s+)?Bearer\s+\S+|Authorization:?\s+\S+/gi, '[AUTH_REDACTED]')

  if (cleaned.length > MAX_ERROR_MESSAGE_LENGTH) {
    cleaned = cleaned.slice(0, MAX_ERROR_MESSAGE_LENGTH) + '…[truncated]'
  }

  return cleaned
}

export function buildHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'Content-Type': TERRAFORM_API.CONTENT_TYPE,
    Accept: TERRAFORM_API.CONTENT_TYPE,
  }
}

/**
 * Classify an HTTP status code into an error kind.
 */
export function classifyStatus(status: number): ApiErrorKind {
  if (status === 401 || status === 403) return 'auth'
  if (status === 404) return 'not_found'
  if (status === 429) return 'rate_limited'
  if (status >= 500) return 'server'
  return 'unexpected_status'
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class TerraformClient {
  readonly connection: TerraformConnection
  readonly limiter: RateLimiter
  private readonly fetchImpl: FetchLike
  private readonly sleep: Sleep
  private readonly baseUrl: URL

  constructor(options: TerraformClientOptions) {
    this.connection = options.connection
    this.limiter = options.limiter
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.sleep = options.sleep ?? defaultSleep
    this.baseUrl = new URL(options.connection.baseUrl.replace(/\/+$/, ''))
  }

  get organizationName(): string {
    return this.connection.organizationName
  }

  /**
   * Absolute URL for an API path. Absolute URLs (pagination links) are
   * accepted as long as they point at the configured API host.
   */
  resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) {
      const target = new URL(pathOrUrl)
      if (target.origin !== this.baseUrl.origin) {
        throw new ApiError(`Refusing to follow link to foreign host ${target.origin}`, 'invalid_response')
      }
      return target.toString()
    }
    const path = pathOrUrl.startsWith('/') ? pathOrUrl : `/${pathOrUrl}`
    return `${this.baseUrl.toString().replace(/\/+$/, '')}${path}`
  }

  /**
   * Issue a request and return the raw response body.
   */
  async send(pathOrUrl: string, options: RequestOptions): Promise<string> {
    const url = this.resolveUrl(pathOrUrl)
    const { method = 'GET', body, expectedStatus } = options
    const token = this.connection.token
    const timeout = this.connection.timeoutMs ?? TERRAFORM_API.REQUEST_TIMEOUT_MS

    await waitForToken(this.limiter, this.sleep, (retryAfterMs) => {
      log.debug(`Rate limit reached, waiting ${retryAfterMs}ms before ${method} ${pathOrUrl}`)
    })

    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeout)

    try {
      const res = await this.fetchImpl(url, {
        method,
        headers: buildHeaders(token),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })

      if (res.status !== expectedStatus) {
        let rawMessage: string
        try {
          rawMessage = await res.text()
        } catch {
          rawMessage = res.statusText
        }
        const safeMessage = sanitizeError(rawMessage || res.statusText, token)
        throw new ApiError(
          `${method} ${pathOrUrl} returned ${res.status} (expected ${expectedStatus}): ${safeMessage}`,
          classifyStatus(res.status),
          res.status
        )
      }

      return await res.text()
    } catch (err) {
      if (err instanceof ApiError) throw err
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ApiError(`${method} ${pathOrUrl} timed out after ${timeout}ms`, 'timeout')
      }
      // DNS, connection refused, etc.
      const msg = err instanceof Error ? sanitizeError(err.message, token) : 'Network error'
      throw new ApiError(`${method} ${pathOrUrl} failed: ${msg}`, 'network')
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Issue a request and validate the JSON body against `schema`.
   */
  async requestJson<S extends z.ZodTypeAny>(
    pathOrUrl: string,
    schema: S,
    options: RequestOptions
  ): Promise<z.output<S>> {
    const text = await this.send(pathOrUrl, options)
    const method = options.method ?? 'GET'

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      throw new ApiError(
        `${method} ${pathOrUrl} returned a body that is not JSON: ${sanitizeError(text, this.connection.token)}`,
        'invalid_response',
        options.expectedStatus
      )
    }

    const result = schema.safeParse(parsed)
    if (!result.success) {
      throw new ApiError(
        `${method} ${pathOrUrl} returned an unexpected body: ${formatZodError(result.error)}`,
        'invalid_response',
        options.expectedStatus
      )
    }
    return result.data
  }
}
