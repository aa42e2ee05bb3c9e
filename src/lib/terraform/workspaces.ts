/**
 * Workspace & Project Lookup
 *
 * Lists the organization's projects and workspaces (both paginated) and joins
 * them through the project relationship embedded in each workspace record.
 */

import { TERRAFORM_API } from '../constants'
import { InputError } from '../errors'
import { createLogger } from '../logger'
import {
  ProjectListResponseSchema,
  WorkspaceListResponseSchema,
  type ProjectListResponse,
  type WorkspaceListResponse,
} from '../validations/schemas'
import { ApiError, type TerraformClient } from './client'
import type { TerraformProject, TerraformWorkspace } from './types'

const log = createLogger('terraform-workspaces')

const HTTP_OK = 200

function pagedPath(path: string, page: number): string {
  const params = new URLSearchParams({
    'page[size]': String(TERRAFORM_API.PAGE_SIZE),
    'page[number]': String(page),
  })
  return `${path}?${params.toString()}`
}

/**
 * Page to fetch after `current`, or null at the end. A page number that does
 * not move forward would loop forever.
 */
function nextPageAfter(current: number, next: number | null | undefined, path: string): number | null {
  if (next === null || next === undefined) return null
  if (next <= current) {
    throw new ApiError(`${path} page ${current} points back to page ${next}`, 'invalid_response')
  }
  return next
}

function orgPath(api: TerraformClient, collection: 'projects' | 'workspaces'): string {
  return `/organizations/${encodeURIComponent(api.organizationName)}/${collection}`
}

/**
 * All projects of the organization, keyed by id.
 */
export async function listProjects(api: TerraformClient): Promise<Map<string, TerraformProject>> {
  const projects = new Map<string, TerraformProject>()
  const path = orgPath(api, 'projects')
  let page: number | null = 1

  while (page !== null) {
    const response: ProjectListResponse = await api.requestJson(
      pagedPath(path, page),
      ProjectListResponseSchema,
      { expectedStatus: HTTP_OK }
    )
    for (const project of response.data) {
      projects.set(project.id, { id: project.id, name: project.attributes.name })
    }
    page = nextPageAfter(page, response.meta?.pagination?.['next-page'], path)
  }

  log.info(`${projects.size} project(s) found`)
  return projects
}

/**
 * All workspaces of the organization with their project resolved.
 */
export async function listWorkspaces(api: TerraformClient): Promise<TerraformWorkspace[]> {
  const projects = await listProjects(api)
  const workspaces: TerraformWorkspace[] = []
  const path = orgPath(api, 'workspaces')
  let page: number | null = 1

  while (page !== null) {
    const response: WorkspaceListResponse = await api.requestJson(
      pagedPath(path, page),
      WorkspaceListResponseSchema,
      { expectedStatus: HTTP_OK }
    )
    for (const workspace of response.data) {
      const projectId = workspace.relationships?.project?.data?.id
      const project = projectId !== undefined ? projects.get(projectId) : undefined
      if (projectId !== undefined && !project) {
        log.warn(`Workspace ${workspace.attributes.name} references unknown project ${projectId}`)
      }
      workspaces.push({
        id: workspace.id,
        name: workspace.attributes.name,
        project: project ?? null,
      })
    }
    page = nextPageAfter(page, response.meta?.pagination?.['next-page'], path)
  }

  log.info(`${workspaces.length} workspace(s) found`)
  return workspaces
}

/**
 * Map workspace names to ids. Fails with an InputError naming every
 * workspace that does not exist, before anything is changed.
 */
export function resolveWorkspaceIds(
  workspaces: readonly TerraformWorkspace[],
  names: readonly string[]
): Map<string, string> {
  const byName = new Map(workspaces.map((ws) => [ws.name, ws.id]))
  const resolved = new Map<string, string>()
  const missing: string[] = []

  for (const name of names) {
    const id = byName.get(name)
    if (id === undefined) {
      missing.push(name)
    } else {
      resolved.set(name, id)
    }
  }

  if (missing.length > 0) {
    throw new InputError('UNKNOWN_WORKSPACE', `Workspace(s) not found: ${missing.join(', ')}`)
  }
  return resolved
}

/**
 * Convenience lookup for a single workspace name.
 */
export async function resolveWorkspaceId(api: TerraformClient, name: string): Promise<string> {
  const workspaces = await listWorkspaces(api)
  const resolved = resolveWorkspaceIds(workspaces, [name])
  const id = resolved.get(name)
  if (id === undefined) {
    throw new InputError('UNKNOWN_WORKSPACE', `Workspace not found: ${name}`)
  }
  return id
}
