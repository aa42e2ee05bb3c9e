/**
 * In-process stand-in for the Terraform API, used through the client's
 * injectable fetch. Keeps projects, workspaces and workspace variables in
 * memory and records every request.
 */

import { z } from 'zod'
import type { FetchLike, HttpMethod, HttpResponse } from '@/lib/terraform'

export interface RecordedRequest {
  method: HttpMethod
  /** Path below the API root, with query string */
  path: string
  headers: RequestInit['headers']
  body: unknown
}

export interface StoredVariable {
  id: string
  key: string
  value: string | null
  description: string
  category: string
  hcl: boolean
  sensitive: boolean
}

interface InjectedFailure {
  method: HttpMethod
  path: string
  status: number
  body: string
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  201: 'Created',
  204: 'No Content',
  401: 'Unauthorized',
  404: 'Not Found',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
}

const PayloadSchema = z.object({
  data: z.object({
    type: z.literal('vars'),
    id: z.string().optional(),
    attributes: z.object({
      key: z.string(),
      value: z.string(),
      description: z.string(),
      category: z.string(),
      hcl: z.boolean(),
      sensitive: z.boolean(),
    }),
  }),
})

const API_ROOT = '/api/v2'

export function respond(status: number, body = ''): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: STATUS_TEXT[status] ?? '',
    text: async () => body,
  }
}

function json(status: number, body: unknown): HttpResponse {
  return respond(status, JSON.stringify(body))
}

function toMethod(method: string | undefined): HttpMethod {
  switch (method) {
    case 'POST':
    case 'PATCH':
    case 'DELETE':
      return method
    default:
      return 'GET'
  }
}

export class FakeTerraformApi {
  readonly organization: string
  readonly requests: RecordedRequest[] = []
  readonly projects: Array<{ id: string; name: string }> = []
  readonly workspaces: Array<{ id: string; name: string; projectId?: string }> = []
  readonly variables = new Map<string, StoredVariable[]>()
  private readonly failures: InjectedFailure[] = []
  private nextVariableId = 1

  constructor(organization = 'test-org') {
    this.organization = organization
  }

  addProject(id: string, name: string): this {
    this.projects.push({ id, name })
    return this
  }

  addWorkspace(id: string, name: string, projectId?: string): this {
    this.workspaces.push({ id, name, ...(projectId !== undefined ? { projectId } : {}) })
    this.variables.set(id, [])
    return this
  }

  /** Store a variable as if it had been created earlier */
  seedVariable(workspaceId: string, variable: Omit<StoredVariable, 'id'> & { id?: string }): StoredVariable {
    const stored: StoredVariable = { ...variable, id: variable.id ?? this.allocateId() }
    this.workspaceVariables(workspaceId).push(stored)
    return stored
  }

  /** The next request matching method and path answers with `status` */
  failNext(method: HttpMethod, path: string, status: number, body = ''): this {
    this.failures.push({ method, path, status, body })
    return this
  }

  variablesOf(workspaceId: string): StoredVariable[] {
    return this.variables.get(workspaceId) ?? []
  }

  readonly fetch: FetchLike = async (url, init) => this.handle(url, init)

  private allocateId(): string {
    return `var-${this.nextVariableId++}`
  }

  private workspaceVariables(workspaceId: string): StoredVariable[] {
    let vars = this.variables.get(workspaceId)
    if (!vars) {
      vars = []
      this.variables.set(workspaceId, vars)
    }
    return vars
  }

  private handle(url: string, init: RequestInit): HttpResponse {
    const parsed = new URL(url)
    const pathname = parsed.pathname.startsWith(API_ROOT)
      ? parsed.pathname.slice(API_ROOT.length)
      : parsed.pathname
    const method = toMethod(init.method)
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined

    this.requests.push({ method, path: `${pathname}${parsed.search}`, headers: init.headers, body })

    const failureIndex = this.failures.findIndex((f) => f.method === method && f.path === pathname)
    if (failureIndex >= 0) {
      const [failure] = this.failures.splice(failureIndex, 1)
      return respond(failure.status, failure.body)
    }

    const segments = pathname.split('/').filter((s) => s !== '').map(decodeURIComponent)

    if (segments[0] === 'organizations' && segments.length === 3 && method === 'GET') {
      if (segments[1] !== this.organization) return respond(404, 'organization not found')
      const pageNumber = Number(parsed.searchParams.get('page[number]') ?? '1')
      const pageSize = Number(parsed.searchParams.get('page[size]') ?? '20')
      if (segments[2] === 'projects') {
        const resources = this.projects.map((p) => ({ id: p.id, type: 'projects', attributes: { name: p.name } }))
        return json(200, this.page(resources, pageNumber, pageSize))
      }
      if (segments[2] === 'workspaces') {
        const resources = this.workspaces.map((ws) => ({
          id: ws.id,
          type: 'workspaces',
          attributes: { name: ws.name },
          relationships: {
            project: { data: ws.projectId !== undefined ? { id: ws.projectId, type: 'projects' } : null },
          },
        }))
        return json(200, this.page(resources, pageNumber, pageSize))
      }
    }

    if (segments[0] === 'workspaces' && segments[2] === 'vars') {
      const vars = this.variables.get(segments[1])
      if (!vars) return respond(404, 'workspace not found')
      const variableId = segments[3]

      if (variableId === undefined && method === 'GET') {
        return json(200, { data: vars.map((v) => this.toResource(v)) })
      }

      if (variableId === undefined && method === 'POST') {
        const payload = PayloadSchema.safeParse(body)
        if (!payload.success) return respond(422, 'invalid payload')
        const { attributes } = payload.data.data
        if (vars.some((v) => v.key === attributes.key && v.category === attributes.category)) {
          return respond(422, `{"errors":[{"detail":"Key has already been taken"}]}`)
        }
        const created: StoredVariable = { id: this.allocateId(), ...attributes }
        vars.push(created)
        return json(201, { data: this.toResource(created) })
      }

      const existing = vars.find((v) => v.id === variableId)
      if (!existing) return respond(404, 'variable not found')

      if (method === 'PATCH') {
        const payload = PayloadSchema.safeParse(body)
        if (!payload.success) return respond(422, 'invalid payload')
        Object.assign(existing, payload.data.data.attributes)
        return json(200, { data: this.toResource(existing) })
      }

      if (method === 'DELETE') {
        vars.splice(vars.indexOf(existing), 1)
        return respond(204)
      }
    }

    return respond(404, 'not found')
  }

  private page<T>(items: T[], pageNumber: number, pageSize: number) {
    const totalPages = Math.max(1, Math.ceil(items.length / pageSize))
    return {
      data: items.slice((pageNumber - 1) * pageSize, pageNumber * pageSize),
      meta: {
        pagination: {
          'current-page': pageNumber,
          'next-page': pageNumber < totalPages ? pageNumber + 1 : null,
          'total-pages': totalPages,
          'total-count': items.length,
        },
      },
    }
  }

  private toResource(variable: StoredVariable) {
    return {
      id: variable.id,
      type: 'vars',
      attributes: {
        key: variable.key,
        value: variable.sensitive ? null : variable.value,
        description: variable.description,
        category: variable.category,
        hcl: variable.hcl,
        sensitive: variable.sensitive,
      },
    }
  }
}
