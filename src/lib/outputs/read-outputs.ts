/**
 * Output Values Reader
 *
 * Reads the file written by `terraform output -json`:
 *
 * ```json
 * { "name": { "sensitive": false, "type": "number", "value": 0 } }
 * ```
 *
 * Sensitive outputs are dropped here and never reach the API. Numbers are
 * read as text, never as doubles.
 */

import { readFile } from 'fs/promises'
import { InputError, errorMessage } from '../errors'
import { createLogger } from '../logger'
import { CodecError, fromJson, parseJsonText, type Value } from '../terraform/value-codec'
import { OutputDocumentSchema, formatZodError } from '../validations/schemas'

const log = createLogger('outputs')

export interface OutputValue {
  name: string
  value: Value
}

/**
 * Parse an output document that is already in memory.
 */
export function parseOutputs(contents: string, path = '<outputs>'): OutputValue[] {
  let json: unknown
  try {
    json = parseJsonText(contents)
  } catch (err) {
    throw new InputError('INVALID_FORMAT', `${path} is not valid JSON: ${errorMessage(err)}`, { path })
  }

  const result = OutputDocumentSchema.safeParse(json)
  if (!result.success) {
    throw new InputError(
      'INVALID_FORMAT',
      `${path} is not a Terraform output document: ${formatZodError(result.error)}`,
      { path }
    )
  }

  const outputs: OutputValue[] = []
  let sensitive = 0

  for (const [name, entry] of Object.entries(result.data)) {
    if (entry.sensitive) {
      sensitive++
      continue
    }
    if (entry.value === undefined) {
      throw new InputError('INVALID_FORMAT', `${path}: output "${name}" has no value`, { path })
    }
    try {
      outputs.push({ name, value: fromJson(entry.value) })
    } catch (err) {
      if (err instanceof CodecError) {
        throw new InputError('INVALID_FORMAT', `${path}: output "${name}": ${err.message}`, { path })
      }
      throw err
    }
  }

  log.info(`Read ${outputs.length} output(s) from ${path}`, { skippedSensitive: sensitive })
  return outputs
}

/**
 * Read non-sensitive outputs from a file, in document order.
 */
export async function getOutputs(path: string): Promise<OutputValue[]> {
  let contents: string
  try {
    contents = await readFile(path, 'utf8')
  } catch (err) {
    throw new InputError('FILE_UNREADABLE', `Cannot read output values file ${path}: ${errorMessage(err)}`, {
      path,
    })
  }
  return parseOutputs(contents, path)
}
