/**
 * Variable Targets
 *
 * Merge the output document with the export list into the list of variables
 * a sync run should produce.
 */

import { InputError } from '../errors'
import type { VariableTarget } from '../terraform/types'
import { readExportList, type ExportList } from './export-list'
import { getOutputs, type OutputValue } from './read-outputs'

/**
 * One target per export entry, in export-list order.
 *
 * Every referenced output must exist and be non-sensitive (sensitive ones
 * were already dropped by the reader). Destination names must be unique.
 */
export function buildVariableTargets(
  exportList: ExportList,
  outputs: readonly OutputValue[]
): VariableTarget[] {
  const byName = new Map(outputs.map((output) => [output.name, output.value]))
  const targets: VariableTarget[] = []
  const missing: string[] = []

  for (const entry of exportList.values()) {
    const value = byName.get(entry.source)
    if (value === undefined) {
      missing.push(entry.source)
      continue
    }
    targets.push({
      name: entry.destination,
      ...(entry.description !== undefined ? { description: entry.description } : {}),
      value,
    })
  }

  if (missing.length > 0) {
    throw new InputError(
      'UNKNOWN_OUTPUT',
      `Export list references output(s) that are missing or sensitive: ${missing.join(', ')}`
    )
  }

  assertUniqueTargetNames(targets)
  return targets
}

/**
 * Throws an InputError listing every name that occurs more than once.
 */
export function assertUniqueTargetNames(targets: readonly VariableTarget[]): void {
  const seen = new Set<string>()
  const duplicates = new Set<string>()

  for (const target of targets) {
    if (seen.has(target.name)) duplicates.add(target.name)
    seen.add(target.name)
  }

  if (duplicates.size > 0) {
    throw new InputError('DUPLICATE_NAME', `Duplicate variable name(s): ${[...duplicates].join(', ')}`)
  }
}

/**
 * Read both input files and build the targets.
 */
export async function loadVariableTargets(
  outputsPath: string,
  exportListPath: string
): Promise<VariableTarget[]> {
  const outputs = await getOutputs(outputsPath)
  const exportList = await readExportList(exportListPath)
  return buildVariableTargets(exportList, outputs)
}
