/**
 * Terraform API Types
 *
 * Domain shapes used on both sides of the sync: what we want remotely
 * (VariableTarget) and what the server holds (RemoteVariable).
 */

import type { Value } from './value-codec'

// =============================================================================
// Variables
// =============================================================================

/**
 * A variable we want to exist in a workspace.
 * `name` is unique within one sync run.
 */
export interface VariableTarget {
  name: string
  description?: string
  value: Value
}

/**
 * A workspace variable as stored by the server.
 */
export interface RemoteVariable {
  id: string
  name: string
  isHCL: boolean
  /** Empty for sensitive variables, whose value is never returned */
  rawValue: string
  description: string
  sensitive: boolean
}

/**
 * Existence of a target in the remote snapshot.
 * `remoteId` is undefined when the variable does not exist yet.
 */
export interface VariableStatus {
  name: string
  remoteId?: string
}

/**
 * JSON:API request body for create/update.
 */
export interface VariablePayload {
  data: {
    type: 'vars'
    id?: string
    attributes: {
      key: string
      value: string
      description: string
      category: string
      hcl: boolean
      sensitive: boolean
    }
  }
}

// =============================================================================
// Projects & Workspaces
// =============================================================================

export interface TerraformProject {
  id: string
  name: string
}

export interface TerraformWorkspace {
  id: string
  name: string
  /** null when the workspace record carries no project relationship */
  project: TerraformProject | null
}
