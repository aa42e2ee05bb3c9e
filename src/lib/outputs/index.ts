/**
 * Local Inputs
 *
 * Output document + export list → VariableTarget[].
 */

export { getOutputs, parseOutputs } from './read-outputs'
export type { OutputValue } from './read-outputs'

export { readExportList, parseExportList } from './export-list'
export type { ExportEntry, ExportList } from './export-list'

export { buildVariableTargets, assertUniqueTargetNames, loadVariableTargets } from './targets'
