/**
 * Human-readable summaries of sync results, printed by the CLI.
 */

import { describeValue } from '../terraform/value-codec'
import type { TerraformWorkspace } from '../terraform/types'
import type { OutputValue } from '../outputs/read-outputs'
import type { SyncResult } from './types'

export function formatSyncReport(result: SyncResult, workspaceName?: string): string {
  const label = workspaceName ? `${workspaceName} (${result.workspaceId})` : result.workspaceId
  const lines: string[] = [`Workspace ${label}: ${result.status}`]

  lines.push(`Variables created: ${result.created.length}.`)
  for (const v of result.created) {
    lines.push(`  + ${v.name} (${v.remoteId}) = ${describeValue(v.value)}`)
  }

  lines.push(`Variables updated: ${result.updated.length}.`)
  for (const v of result.updated) {
    lines.push(`  ~ ${v.name} (${v.remoteId}) = ${describeValue(v.value)}`)
  }

  if (result.ignoredExisting.length > 0) {
    lines.push(`Variables already existing, not updated: ${result.ignoredExisting.length}.`)
    for (const name of result.ignoredExisting) {
      lines.push(`  ! ${name}`)
    }
  }

  for (const failure of result.failures) {
    lines.push(`Failed to ${failure.operation} ${failure.name} [${failure.kind}]: ${failure.message}`)
  }
  if (result.notAttempted.length > 0) {
    lines.push(`Not attempted: ${result.notAttempted.join(', ')}`)
  }

  return lines.join('\n')
}

/**
 * Listing printed by --show-outputs.
 */
export function formatOutputs(outputs: readonly OutputValue[]): string {
  const lines = [`Number of outputs: ${outputs.length}.`]
  outputs.forEach((output, i) => {
    lines.push(`--- ${i + 1} ---`, `name : ${output.name}`, `value: ${describeValue(output.value, 200)}`)
  })
  return lines.join('\n')
}

/**
 * Listing printed by --show-workspaces.
 */
export function formatWorkspaces(workspaces: readonly TerraformWorkspace[]): string {
  return JSON.stringify(workspaces, null, 2)
}
