/**
 * Tests for the Terraform API request helper.
 *
 * Source: src/lib/terraform/client.ts
 *
 * Covers:
 * - Secret redaction in error paths
 * - Status classification and the single expected status
 * - Timeouts, network failures and malformed bodies
 * - Refusal to follow links to another host
 * - Requests wait for the shared rate limiter
 */

import { RateLimiter } from '@/lib/rate-limit'
import {
  ApiError,
  TerraformClient,
  buildHeaders,
  classifyStatus,
  sanitizeError,
  type ApiErrorKind,
  type FetchLike,
  type HttpResponse,
  type TerraformConnection,
} from '@/lib/terraform/client'
import { VariableListResponseSchema } from '@/lib/validations/schemas'
import { respond } from './helpers/fake-terraform-api'

const connection: TerraformConnection = {
  baseUrl: 'https://tfe.test/api/v2',
  organizationName: 'test-org',
  token: 'test-secret',
}

function mockFetch(response: HttpResponse) {
  return jest.fn<Promise<HttpResponse>, Parameters<FetchLike>>(async () => response)
}

function makeClient(fetch: FetchLike, overrides: Partial<TerraformConnection> = {}) {
  return new TerraformClient({
    connection: { ...connection, ...overrides },
    limiter: new RateLimiter({ maxRequests: 100, windowMs: 1000 }),
    fetch,
  })
}

async function captureError(promise: Promise<unknown>): Promise<ApiError> {
  try {
    await promise
  } catch (error) {
    if (error instanceof ApiError) return error
    throw error
  }
  throw new Error('expected the request to fail')
}

// ==========================================================================
// sanitizeError()
// ==========================================================================

describe('sanitizeError()', () => {
  it('strips the API token from error messages', () => {
    expect(sanitizeError('token test-secret was rejected', 'test-secret')).toBe('token [REDACTED] was rejected')
  })

  it('masks bearer credentials', () => {
    expect(sanitizeError('sent Bearer abc.def.ghi')).toBe('sent [AUTH_REDACTED]')
    expect(sanitizeError('Authorization: Bearer abc.def')).toBe('[AUTH_REDACTED]')
    expect(sanitizeError('authorization: abc')).toBe('[AUTH_REDACTED]')
  })

  it('truncates long messages', () => {
    expect(sanitizeError('x'.repeat(250))).toBe(`${'x'.repeat(200)}…[truncated]`)
  })

  it('leaves harmless messages alone', () => {
    expect(sanitizeError('workspace not found', 'test-secret')).toBe('workspace not found')
  })
})

// ==========================================================================
// classifyStatus() / buildHeaders()
// ==========================================================================

describe('classifyStatus()', () => {
  const cases: Array<[number, ApiErrorKind]> = [
    [401, 'auth'],
    [403, 'auth'],
    [404, 'not_found'],
    [429, 'rate_limited'],
    [500, 'server'],
    [503, 'server'],
    [200, 'unexpected_status'],
    [422, 'unexpected_status'],
  ]

  it.each(cases)('%i is %s', (status, kind) => {
    expect(classifyStatus(status)).toBe(kind)
  })
})

describe('buildHeaders()', () => {
  it('sends the bearer token and the JSON:API media type', () => {
    expect(buildHeaders('test-secret')).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/vnd.api+json',
      Accept: 'application/vnd.api+json',
    })
  })
})

// ==========================================================================
// TerraformClient
// ==========================================================================

describe('TerraformClient.resolveUrl()', () => {
  const client = makeClient(mockFetch(respond(200)))

  it('joins paths onto the API root', () => {
    expect(client.resolveUrl('/workspaces/ws-1/vars')).toBe('https://tfe.test/api/v2/workspaces/ws-1/vars')
    expect(client.resolveUrl('workspaces/ws-1/vars')).toBe('https://tfe.test/api/v2/workspaces/ws-1/vars')
  })

  it('follows absolute links on the same host', () => {
    expect(client.resolveUrl('https://tfe.test/api/v2/workspaces/ws-1/vars?page=2')).toBe(
      'https://tfe.test/api/v2/workspaces/ws-1/vars?page=2'
    )
  })

  it('refuses links to another host', () => {
    expect(() => client.resolveUrl('https://elsewhere.test/api/v2/vars')).toThrow(
      'Refusing to follow link to foreign host https://elsewhere.test'
    )
  })

  it('accepts a base URL with a trailing slash', () => {
    const slashed = makeClient(mockFetch(respond(200)), { baseUrl: 'https://tfe.test/api/v2/' })
    expect(slashed.resolveUrl('/ping')).toBe('https://tfe.test/api/v2/ping')
  })
})

describe('TerraformClient.send()', () => {
  it('sends method, headers and JSON body', async () => {
    const fetch = mockFetch(respond(201, '{"ok":true}'))
    const client = makeClient(fetch)

    const text = await client.send('/workspaces/ws-1/vars', {
      method: 'POST',
      body: { data: { type: 'vars' } },
      expectedStatus: 201,
    })

    expect(text).toBe('{"ok":true}')
    expect(fetch).toHaveBeenCalledTimes(1)
    const [url, init] = fetch.mock.calls[0]
    expect(url).toBe('https://tfe.test/api/v2/workspaces/ws-1/vars')
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual(buildHeaders('test-secret'))
    expect(init.body).toBe('{"data":{"type":"vars"}}')
  })

  it('sends no body on GET', async () => {
    const fetch = mockFetch(respond(200, '{}'))
    await makeClient(fetch).send('/ping', { expectedStatus: 200 })

    const [, init] = fetch.mock.calls[0]
    expect(init.method).toBe('GET')
    expect(init.body).toBeUndefined()
  })

  it('treats any other status as an error, including other 2xx', async () => {
    const client = makeClient(mockFetch(respond(200, '{}')))
    const error = await captureError(client.send('/workspaces/ws-1/vars', { method: 'POST', expectedStatus: 201 }))

    expect(error.kind).toBe('unexpected_status')
    expect(error.statusCode).toBe(200)
    expect(error.message).toBe('POST /workspaces/ws-1/vars returned 200 (expected 201): {}')
  })

  it('classifies error statuses', async () => {
    const client = makeClient(mockFetch(respond(404, 'workspace not found')))
    const error = await captureError(client.send('/workspaces/ws-1/vars', { expectedStatus: 200 }))

    expect(error.kind).toBe('not_found')
    expect(error.statusCode).toBe(404)
    expect(error.message).toBe('GET /workspaces/ws-1/vars returned 404 (expected 200): workspace not found')
  })

  it('falls back to the status text for empty error bodies', async () => {
    const client = makeClient(mockFetch(respond(500)))
    const error = await captureError(client.send('/ping', { expectedStatus: 200 }))

    expect(error.kind).toBe('server')
    expect(error.message).toBe('GET /ping returned 500 (expected 200): Internal Server Error')
  })

  it('never echoes the token from an error body', async () => {
    const client = makeClient(mockFetch(respond(401, 'bad token test-secret')))
    const error = await captureError(client.send('/workspaces/ws-1/vars', { method: 'POST', expectedStatus: 201 }))

    expect(error.kind).toBe('auth')
    expect(error.message).toBe('POST /workspaces/ws-1/vars returned 401 (expected 201): bad token [REDACTED]')
  })

  it('wraps network failures', async () => {
    const fetch = jest.fn<Promise<HttpResponse>, Parameters<FetchLike>>(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:443')
    })
    const error = await captureError(makeClient(fetch).send('/ping', { expectedStatus: 200 }))

    expect(error.kind).toBe('network')
    expect(error.statusCode).toBeNull()
    expect(error.message).toBe('GET /ping failed: connect ECONNREFUSED 127.0.0.1:443')
  })

  it('aborts requests that exceed the timeout', async () => {
    const fetch: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          const abort = new Error('This operation was aborted')
          abort.name = 'AbortError'
          reject(abort)
        })
      })
    const error = await captureError(makeClient(fetch, { timeoutMs: 5 }).send('/slow', { expectedStatus: 200 }))

    expect(error.kind).toBe('timeout')
    expect(error.message).toBe('GET /slow timed out after 5ms')
  })
})

describe('TerraformClient.requestJson()', () => {
  it('returns the validated body', async () => {
    const body = { data: [{ id: 'var-1', attributes: { key: 'a', value: '1', hcl: false } }] }
    const client = makeClient(mockFetch(respond(200, JSON.stringify(body))))

    const page = await client.requestJson('/workspaces/ws-1/vars', VariableListResponseSchema, { expectedStatus: 200 })
    expect(page.data[0].attributes).toEqual({ key: 'a', value: '1', description: '', hcl: false, sensitive: false })
  })

  it('rejects bodies that are not JSON', async () => {
    const client = makeClient(mockFetch(respond(200, '<html>')))
    const error = await captureError(
      client.requestJson('/workspaces/ws-1/vars', VariableListResponseSchema, { expectedStatus: 200 })
    )

    expect(error.kind).toBe('invalid_response')
    expect(error.message).toBe('GET /workspaces/ws-1/vars returned a body that is not JSON: <html>')
  })

  it('rejects bodies that do not match the schema', async () => {
    const client = makeClient(mockFetch(respond(200, '{}')))
    const error = await captureError(
      client.requestJson('/workspaces/ws-1/vars', VariableListResponseSchema, { expectedStatus: 200 })
    )

    expect(error.kind).toBe('invalid_response')
    expect(error.message).toBe('GET /workspaces/ws-1/vars returned an unexpected body: data: Required')
  })
})

describe('TerraformClient rate limiting', () => {
  it('waits for the limiter before each request', async () => {
    let t = 0
    const sleep = jest.fn(async (ms: number) => {
      t += ms
    })
    const fetch = mockFetch(respond(200, '{}'))
    const client = new TerraformClient({
      connection,
      limiter: new RateLimiter({ maxRequests: 1, windowMs: 1000, now: () => t }),
      fetch,
      sleep,
    })

    await client.send('/ping', { expectedStatus: 200 })
    await client.send('/ping', { expectedStatus: 200 })
    await client.send('/ping', { expectedStatus: 200 })

    expect(fetch).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[1000], [1000]])
    expect(t).toBe(2000)
  })
})
