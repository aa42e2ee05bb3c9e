/**
 * Export List Reader
 *
 * The export list says which outputs are exported and under which variable
 * name, one record per line:
 *
 * ```text
 * # source_output,variable_name[,description]
 * vpc_id,network_vpc_id,VPC shared with the app stack
 * subnet_ids,network_subnet_ids
 * ```
 *
 * Blank lines and lines starting with `#` are skipped. The description is
 * everything after the second comma, so it may itself contain commas.
 */

import { readFile } from 'fs/promises'
import { EXPORT_LIST } from '../constants'
import { InputError, errorMessage } from '../errors'
import { createLogger } from '../logger'

const log = createLogger('export-list')

export interface ExportEntry {
  /** Output name in the output document */
  source: string
  /** Variable name in the workspace */
  destination: string
  description?: string
  /** 1-based line the entry came from */
  line: number
}

/** Keyed by source output name, in file order */
export type ExportList = Map<string, ExportEntry>

/**
 * Parse an export list that is already in memory.
 */
export function parseExportList(contents: string, path = '<export-list>'): ExportList {
  const entries: ExportList = new Map()
  const destinations = new Map<string, number>()
  const lines = contents.split(/\r?\n/)

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1
    const line = rawLine.trim()
    if (line === '' || line.startsWith(EXPORT_LIST.COMMENT_PREFIX)) return

    const [rawSource, rawDestination, ...rest] = line.split(EXPORT_LIST.FIELD_SEPARATOR)
    const source = rawSource.trim()
    const destination = rawDestination?.trim() ?? ''
    const description = rest.join(EXPORT_LIST.FIELD_SEPARATOR).trim()

    if (source === '' || destination === '') {
      throw new InputError(
        'INVALID_FORMAT',
        `${path}:${lineNumber}: expected "source,destination[,description]", got "${line}"`,
        { path, line: lineNumber }
      )
    }

    const previous = entries.get(source)
    if (previous) {
      throw new InputError(
        'DUPLICATE_NAME',
        `${path}:${lineNumber}: output "${source}" is already exported on line ${previous.line}`,
        { path, line: lineNumber }
      )
    }

    const previousLine = destinations.get(destination)
    if (previousLine !== undefined) {
      throw new InputError(
        'DUPLICATE_NAME',
        `${path}:${lineNumber}: variable "${destination}" is already a destination on line ${previousLine}`,
        { path, line: lineNumber }
      )
    }

    destinations.set(destination, lineNumber)
    entries.set(source, {
      source,
      destination,
      ...(description !== '' ? { description } : {}),
      line: lineNumber,
    })
  })

  if (entries.size === 0) {
    throw new InputError('NO_ENTRIES', `No entry found in export list ${path}`, { path })
  }

  log.info(`Read ${entries.size} export entr${entries.size === 1 ? 'y' : 'ies'} from ${path}`)
  return entries
}

export async function readExportList(path: string): Promise<ExportList> {
  let contents: string
  try {
    contents = await readFile(path, 'utf8')
  } catch (err) {
    throw new InputError('FILE_UNREADABLE', `Cannot read export list ${path}: ${errorMessage(err)}`, { path })
  }
  return parseExportList(contents, path)
}
