/**
 * Terraform API Module
 *
 * Usage:
 * ```typescript
 * import { TerraformClient, TerraformVariablesClient } from './lib/terraform'
 * import { createTerraformRateLimiter } from './lib/rate-limit'
 *
 * const api = new TerraformClient({ connection, limiter: createTerraformRateLimiter() })
 * const variables = new TerraformVariablesClient(api)
 * const existing = await variables.list(workspaceId)
 * ```
 */

// Types
export type {
  VariableTarget,
  RemoteVariable,
  VariableStatus,
  VariablePayload,
  TerraformProject,
  TerraformWorkspace,
} from './types'

// Codec
export {
  CodecError,
  Values,
  classify,
  decode,
  describeValue,
  encode,
  fromJson,
  normalizeNumberText,
  parseJsonText,
  toJson,
  toJsonText,
  valuesEqual,
} from './value-codec'
export type { Value, ValueKind, Classification } from './value-codec'

// HTTP
export {
  ApiError,
  TerraformClient,
  buildHeaders,
  classifyStatus,
  sanitizeError,
} from './client'
export type {
  ApiErrorKind,
  FetchLike,
  HttpMethod,
  HttpResponse,
  RequestOptions,
  TerraformClientOptions,
  TerraformConnection,
} from './client'

// Variables
export { TerraformVariablesClient, buildVariablePayload } from './variables'

// Workspaces
export { listProjects, listWorkspaces, resolveWorkspaceId, resolveWorkspaceIds } from './workspaces'
