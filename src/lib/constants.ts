/**
 * Centralized Constants
 *
 * All magic values used across tfvar-sync, grouped by domain.
 * Import from here instead of using inline literals.
 */

// =============================================================================
// Terraform API
// =============================================================================

export const TERRAFORM_API = {
  /** API root used when --base-url is not given */
  DEFAULT_BASE_URL: 'https://app.terraform.io/api/v2',
  /** Appended to a --base-url that names only a host */
  API_PATH: '/api/v2',
  /** JSON:API media type, sent on every request */
  CONTENT_TYPE: 'application/vnd.api+json',
  /** Largest page size accepted by the projects/workspaces listings */
  PAGE_SIZE: 100,
  /** Per-request timeout (ms) */
  REQUEST_TIMEOUT_MS: 15_000,
  /** Variable category for values read by Terraform itself (vs. 'env') */
  VARIABLE_CATEGORY: 'terraform',
} as const

// =============================================================================
// Rate Limiting
// =============================================================================

export const RATE_LIMIT = {
  /** Requests per window allowed by the API's rate limit */
  MAX_REQUESTS_PER_SECOND: 20,
  /** Window size (ms) */
  WINDOW_MS: 1000,
} as const

// =============================================================================
// Environment
// =============================================================================

export const ENV = {
  ORGANIZATION_NAME: 'TFVE_ORGANIZATION_NAME',
  TOKEN: 'TFVE_TOKEN',
  REQUEST_TIMEOUT_MS: 'TFVE_REQUEST_TIMEOUT_MS',
  LOG_LEVEL: 'LOG_LEVEL',
} as const

// =============================================================================
// Export List
// =============================================================================

export const EXPORT_LIST = {
  /** Lines starting with this are ignored */
  COMMENT_PREFIX: '#',
  FIELD_SEPARATOR: ',',
} as const

// =============================================================================
// Error Sanitization
// =============================================================================

/** Error messages are truncated to this many characters before being surfaced */
export const MAX_ERROR_MESSAGE_LENGTH = 200
