/**
 * Sync Engine
 *
 * Reconciles a list of variable targets with the variables of one workspace:
 * list what exists, create what is missing, then update what exists when
 * allowed.
 *
 * Runs are strictly sequential. Creates happen before updates and each phase
 * follows the input order, so logs and request order are reproducible. The
 * first per-item failure stops the run; what was already applied stays.
 */

import { createLogger, type Logger } from '../logger'
import { assertUniqueTargetNames } from '../outputs/targets'
import { ApiError } from '../terraform/client'
import type { RemoteVariable, VariableStatus, VariableTarget } from '../terraform/types'
import { CodecError, classify, decode, describeValue, valuesEqual } from '../terraform/value-codec'
import type {
  AppliedVariable,
  SyncFailure,
  SyncOperation,
  SyncOptions,
  SyncPartition,
  SyncPhase,
  SyncResult,
  VariableStore,
} from './types'

// =============================================================================
// Pure helpers
// =============================================================================

/**
 * Existence of each target in a remote snapshot, in target order.
 */
export function getVariableStatuses(
  targets: readonly VariableTarget[],
  remote: ReadonlyMap<string, RemoteVariable>
): VariableStatus[] {
  return targets.map((target) => {
    const existing = remote.get(target.name)
    return existing ? { name: target.name, remoteId: existing.id } : { name: target.name }
  })
}

/**
 * Split targets into those to create and those that already exist.
 * Membership is decided by name only.
 */
export function partitionTargets(
  targets: readonly VariableTarget[],
  remote: ReadonlyMap<string, RemoteVariable>
): SyncPartition {
  const partition: SyncPartition = { toCreate: [], existing: [] }
  const statuses = getVariableStatuses(targets, remote)

  targets.forEach((target, i) => {
    const { remoteId } = statuses[i]
    if (remoteId === undefined) {
      partition.toCreate.push(target)
    } else {
      const sensitive = remote.get(target.name)?.sensitive ?? false
      partition.existing.push({ target, remoteId, sensitive })
    }
  })

  return partition
}

/**
 * Decode what the server stored and check it matches what we sent.
 */
export function verifyRoundTrip(target: VariableTarget, remote: RemoteVariable): AppliedVariable {
  const { isHCL, isString } = classify(target.value)
  if (remote.isHCL !== isHCL) {
    throw new CodecError(`Server stored ${target.name} with hcl=${remote.isHCL}, expected hcl=${isHCL}`)
  }

  const value = decode(remote.isHCL, isString, remote.rawValue)
  if (!valuesEqual(value, target.value)) {
    throw new CodecError(
      `Server stored ${target.name} as ${describeValue(value)}, expected ${describeValue(target.value)}`
    )
  }

  return { name: target.name, remoteId: remote.id, value }
}

function toFailure(name: string, operation: SyncOperation, error: ApiError | CodecError): SyncFailure {
  return {
    name,
    operation,
    kind: error instanceof ApiError ? error.kind : 'codec',
    message: error.message,
  }
}

// =============================================================================
// Sync Engine Class
// =============================================================================

export class SyncEngine {
  private readonly store: VariableStore
  private readonly log: Logger

  constructor(store: VariableStore, log: Logger = createLogger('sync')) {
    this.store = store
    this.log = log
  }

  /**
   * Sync one workspace.
   *
   * Throws InputError for duplicate target names (before any request) and
   * ApiError when the initial listing fails. Per-item failures are reported
   * in the result instead.
   */
  async sync(
    targets: readonly VariableTarget[],
    workspaceId: string,
    options: SyncOptions = {}
  ): Promise<SyncResult> {
    const startTime = Date.now()
    const log = this.log.child(workspaceId)

    assertUniqueTargetNames(targets)

    const result: SyncResult = {
      workspaceId,
      status: 'completed',
      phase: 'listing',
      created: [],
      updated: [],
      ignoredExisting: [],
      failures: [],
      notAttempted: [],
      durationMs: 0,
    }
    const enter = (phase: SyncPhase) => {
      result.phase = phase
      log.debug(`Phase: ${phase}`)
    }

    // 1. Snapshot remote state
    let remote: Map<string, RemoteVariable>
    try {
      remote = await this.store.list(workspaceId)
    } catch (error) {
      log.error('Failed to list workspace variables', error instanceof Error ? error.message : error)
      throw error
    }

    // 2. Partition against the snapshot
    enter('partitioning')
    const { toCreate, existing } = partitionTargets(targets, remote)
    log.info(`${toCreate.length} to create, ${existing.length} already exist`)

    const finish = (): SyncResult => {
      result.durationMs = Date.now() - startTime
      return result
    }
    const fail = (failure: SyncFailure, notAttempted: string[]): SyncResult => {
      result.failedPhase = result.phase
      result.status = 'failed'
      result.failures.push(failure)
      result.notAttempted = notAttempted
      enter('failed')
      log.error(`Failed to ${failure.operation} ${failure.name}: ${failure.message}`)
      if (notAttempted.length > 0) {
        log.error(`Stopped before ${notAttempted.length} remaining variable(s): ${notAttempted.join(', ')}`)
      }
      return finish()
    }

    // 3. Create missing variables, in input order
    enter('creating')
    for (let i = 0; i < toCreate.length; i++) {
      const target = toCreate[i]
      try {
        const created = await this.store.create(workspaceId, target)
        const applied = verifyRoundTrip(target, created)
        result.created.push(applied)
        log.info(`Created ${applied.name} (${applied.remoteId}) = ${describeValue(applied.value)}`)
      } catch (error) {
        if (!(error instanceof ApiError || error instanceof CodecError)) throw error
        return fail(toFailure(target.name, 'create', error), [
          ...toCreate.slice(i + 1).map((t) => t.name),
          ...existing.map((e) => e.target.name),
        ])
      }
    }

    // 4. Update existing variables, or report them
    if (!options.allowUpdate) {
      enter('skipping_update')
      result.ignoredExisting = existing.map((e) => e.target.name)
      if (result.ignoredExisting.length > 0) {
        log.warn(
          `${result.ignoredExisting.length} variable(s) already exist and were not updated ` +
            `(pass --allow-update to overwrite): ${result.ignoredExisting.join(', ')}`
        )
      }
    } else {
      enter('updating')
      for (let i = 0; i < existing.length; i++) {
        const { target, remoteId, sensitive } = existing[i]
        const notAttempted = existing.slice(i + 1).map((e) => e.target.name)
        // The server never echoes a sensitive value back
        if (sensitive) {
          return fail(
            {
              name: target.name,
              operation: 'update',
              kind: 'sensitive',
              message: `${target.name} is sensitive in the workspace and cannot be overwritten`,
            },
            notAttempted
          )
        }
        try {
          const updated = await this.store.update(workspaceId, remoteId, target)
          const applied = verifyRoundTrip(target, updated)
          result.updated.push(applied)
          log.info(`Updated ${applied.name} (${applied.remoteId}) = ${describeValue(applied.value)}`)
        } catch (error) {
          if (!(error instanceof ApiError || error instanceof CodecError)) throw error
          return fail(toFailure(target.name, 'update', error), notAttempted)
        }
      }
    }

    enter('done')
    log.info(
      `Sync complete: ${result.created.length} created, ${result.updated.length} updated, ` +
        `${result.ignoredExisting.length} ignored`
    )
    return finish()
  }
}
