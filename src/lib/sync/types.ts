/**
 * Sync Engine Types
 *
 * Type definitions for one variable sync run against one workspace.
 */

import type { ApiErrorKind } from '../terraform/client'
import type { RemoteVariable, VariableTarget } from '../terraform/types'
import type { Value } from '../terraform/value-codec'

// =============================================================================
// Sync Options
// =============================================================================

/**
 * Options for controlling sync behavior
 */
export interface SyncOptions {
  /** Update variables that already exist (otherwise they are only reported) */
  allowUpdate?: boolean
}

/**
 * The part of the variables client the engine depends on
 */
export interface VariableStore {
  list(workspaceId: string): Promise<Map<string, RemoteVariable>>
  create(workspaceId: string, target: VariableTarget): Promise<RemoteVariable>
  update(workspaceId: string, id: string, target: VariableTarget): Promise<RemoteVariable>
}

// =============================================================================
// Sync Results
// =============================================================================

/**
 * Phases of a run, in order. `failed` can follow any of them.
 */
export type SyncPhase =
  | 'listing'
  | 'partitioning'
  | 'creating'
  | 'updating'
  | 'skipping_update'
  | 'done'
  | 'failed'

/**
 * Status of a sync run
 */
export type SyncRunStatus = 'running' | 'completed' | 'failed'

export type SyncOperation = 'create' | 'update'

/**
 * A variable written to the workspace. `value` is decoded from what the
 * server echoed back.
 */
export interface AppliedVariable {
  name: string
  remoteId: string
  value: Value
}

/**
 * A target that could not be applied
 */
export interface SyncFailure {
  name: string
  operation: SyncOperation
  /** 'sensitive': the existing variable is sensitive and was not touched */
  kind: ApiErrorKind | 'codec' | 'sensitive'
  message: string
}

/**
 * Result of a sync operation
 */
export interface SyncResult {
  workspaceId: string
  status: Exclude<SyncRunStatus, 'running'>
  /** Last phase entered; 'failed' runs record where they stopped in failedPhase */
  phase: SyncPhase
  failedPhase?: SyncPhase
  created: AppliedVariable[]
  updated: AppliedVariable[]
  /** Existing variables left alone because updates were not allowed */
  ignoredExisting: string[]
  failures: SyncFailure[]
  /** Targets skipped because the run stopped at an earlier failure */
  notAttempted: string[]
  durationMs: number
}

/**
 * Targets split by remote existence
 */
export interface SyncPartition {
  toCreate: VariableTarget[]
  existing: Array<{ target: VariableTarget; remoteId: string; sensitive: boolean }>
}
