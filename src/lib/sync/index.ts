/**
 * Sync Module
 *
 * Reconcile exported Terraform outputs with workspace variables.
 *
 * Usage:
 * ```typescript
 * import { SyncEngine } from './lib/sync'
 *
 * const engine = new SyncEngine(variablesClient)
 * const result = await engine.sync(targets, workspaceId, {
 *   allowUpdate: false, // report existing variables instead of overwriting
 * })
 * ```
 */

// Types
export type {
  SyncOptions,
  SyncResult,
  SyncPhase,
  SyncRunStatus,
  SyncOperation,
  SyncFailure,
  SyncPartition,
  AppliedVariable,
  VariableStore,
} from './types'

// Engine
export { SyncEngine, getVariableStatuses, partitionTargets, verifyRoundTrip } from './engine'

// Reports
export { formatSyncReport, formatOutputs, formatWorkspaces } from './report'
