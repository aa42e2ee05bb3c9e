/**
 * Workspace Variables Client
 *
 * List/create/update/delete against `/workspaces/{id}/vars`. This is the only
 * code that mutates remote state.
 *
 * API reference: https://developer.hashicorp.com/terraform/cloud-docs/api-docs/workspace-variables
 */

import { TERRAFORM_API } from '../constants'
import { createLogger } from '../logger'
import {
  VariableListResponseSchema,
  VariableResponseSchema,
  type VariableListResponse,
  type VariableResource,
} from '../validations/schemas'
import { ApiError, TerraformClient, type TerraformClientOptions } from './client'
import type { RemoteVariable, VariablePayload, VariableTarget } from './types'
import { classify, encode } from './value-codec'

const log = createLogger('terraform-variables')

const HTTP_OK = 200
const HTTP_CREATED = 201
const HTTP_NO_CONTENT = 204

// ---------------------------------------------------------------------------
// Payload shaping
// ---------------------------------------------------------------------------

/**
 * Request body for a target. `id` is set for updates only.
 */
export function buildVariablePayload(target: VariableTarget, id?: string): VariablePayload {
  const { isHCL } = classify(target.value)
  return {
    data: {
      type: 'vars',
      ...(id !== undefined ? { id } : {}),
      attributes: {
        key: target.name,
        value: encode(target.value),
        description: target.description ?? '',
        category: TERRAFORM_API.VARIABLE_CATEGORY,
        hcl: isHCL,
        sensitive: false,
      },
    },
  }
}

function toRemoteVariable(resource: VariableResource): RemoteVariable {
  return {
    id: resource.id,
    name: resource.attributes.key,
    isHCL: resource.attributes.hcl,
    rawValue: resource.attributes.value,
    description: resource.attributes.description,
    sensitive: resource.attributes.sensitive,
  }
}

function varsPath(workspaceId: string, variableId?: string): string {
  const base = `/workspaces/${encodeURIComponent(workspaceId)}/vars`
  return variableId === undefined ? base : `${base}/${encodeURIComponent(variableId)}`
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class TerraformVariablesClient {
  private readonly api: TerraformClient

  constructor(api: TerraformClient | TerraformClientOptions) {
    this.api = api instanceof TerraformClient ? api : new TerraformClient(api)
  }

  /**
   * Terraform variables of a workspace, keyed by name. Environment variables
   * share the endpoint but not the key space, so they are left out.
   *
   * The endpoint answers with every variable in one response today; if the
   * server starts paginating, `links.next` is followed until exhausted.
   */
  async list(workspaceId: string): Promise<Map<string, RemoteVariable>> {
    const variables = new Map<string, RemoteVariable>()
    const visited = new Set<string>()
    let next: string | null = varsPath(workspaceId)
    let skipped = 0

    while (next) {
      if (visited.has(next)) {
        throw new ApiError(`Pagination link repeats: ${next}`, 'invalid_response')
      }
      visited.add(next)

      const page: VariableListResponse = await this.api.requestJson(next, VariableListResponseSchema, {
        expectedStatus: HTTP_OK,
      })

      for (const resource of page.data) {
        const { category } = resource.attributes
        if (category !== undefined && category !== TERRAFORM_API.VARIABLE_CATEGORY) {
          skipped++
          continue
        }
        variables.set(resource.attributes.key, toRemoteVariable(resource))
      }
      next = page.links?.next ?? null
    }

    log.info(`Found ${variables.size} variable(s) in workspace ${workspaceId}`, {
      pages: visited.size,
      otherCategories: skipped,
    })
    return variables
  }

  /**
   * Create a variable. The returned record is the server's echo, not the
   * request we sent.
   */
  async create(workspaceId: string, target: VariableTarget): Promise<RemoteVariable> {
    const response = await this.api.requestJson(varsPath(workspaceId), VariableResponseSchema, {
      method: 'POST',
      body: buildVariablePayload(target),
      expectedStatus: HTTP_CREATED,
    })
    const created = toRemoteVariable(response.data)
    log.debug(`Created ${created.name} (${created.id})`)
    return created
  }

  async update(workspaceId: string, id: string, target: VariableTarget): Promise<RemoteVariable> {
    const response = await this.api.requestJson(varsPath(workspaceId, id), VariableResponseSchema, {
      method: 'PATCH',
      body: buildVariablePayload(target, id),
      expectedStatus: HTTP_OK,
    })
    const updated = toRemoteVariable(response.data)
    log.debug(`Updated ${updated.name} (${updated.id})`)
    return updated
  }

  /**
   * Delete a variable. Not part of the sync flow; used by maintenance
   * tooling and to clean up after integration runs.
   */
  async delete(workspaceId: string, id: string): Promise<void> {
    await this.api.send(varsPath(workspaceId, id), {
      method: 'DELETE',
      expectedStatus: HTTP_NO_CONTENT,
    })
    log.debug(`Deleted variable ${id}`)
  }
}
