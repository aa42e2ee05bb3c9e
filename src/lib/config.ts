/**
 * Runtime Configuration
 *
 * Combines environment variables with CLI flags into the connection settings
 * for the Terraform API.
 *
 * Required env vars:
 *   TFVE_ORGANIZATION_NAME   organization owning the workspaces
 *   TFVE_TOKEN               user or team API token
 * Optional:
 *   TFVE_REQUEST_TIMEOUT_MS  per-request timeout, default 15000
 */

import { TERRAFORM_API } from './constants'
import { InputError } from './errors'
import type { TerraformConnection } from './terraform/client'
import { BaseUrlSchema, EnvironmentSchema, formatZodError } from './validations/schemas'

export interface ConnectionFlags {
  baseUrl?: string
}

/**
 * API root for a base URL. A bare host (https://tfe.example.com) gets the
 * standard API path appended; anything with a path is used as given.
 */
export function toApiRoot(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '')
  return new URL(trimmed).pathname === '/' ? `${trimmed}${TERRAFORM_API.API_PATH}` : trimmed
}

export function loadConnectionConfig(
  env: NodeJS.ProcessEnv = process.env,
  flags: ConnectionFlags = {}
): TerraformConnection {
  const parsedEnv = EnvironmentSchema.safeParse(env)
  if (!parsedEnv.success) {
    throw new InputError('INVALID_CONFIG', formatZodError(parsedEnv.error))
  }

  const baseUrl = BaseUrlSchema.safeParse(flags.baseUrl ?? TERRAFORM_API.DEFAULT_BASE_URL)
  if (!baseUrl.success) {
    throw new InputError('INVALID_CONFIG', formatZodError(baseUrl.error))
  }

  return {
    baseUrl: toApiRoot(baseUrl.data),
    organizationName: parsedEnv.data.TFVE_ORGANIZATION_NAME,
    token: parsedEnv.data.TFVE_TOKEN,
    timeoutMs: parsedEnv.data.TFVE_REQUEST_TIMEOUT_MS ?? TERRAFORM_API.REQUEST_TIMEOUT_MS,
  }
}
