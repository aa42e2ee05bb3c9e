/**
 * Local input errors.
 *
 * Raised for anything wrong with what the user handed us: unreadable or
 * malformed files, duplicate names, missing configuration. Always thrown
 * before the first remote mutation, so a run that fails with one has changed
 * nothing.
 */

export type InputErrorCode =
  | 'FILE_UNREADABLE'
  | 'INVALID_FORMAT'
  | 'NO_ENTRIES'
  | 'DUPLICATE_NAME'
  | 'UNKNOWN_OUTPUT'
  | 'UNKNOWN_WORKSPACE'
  | 'INVALID_CONFIG'

export class InputError extends Error {
  readonly code: InputErrorCode
  /** File the error was found in, when there is one */
  readonly path: string | null
  /** 1-based line number within `path` */
  readonly line: number | null

  constructor(
    code: InputErrorCode,
    message: string,
    location: { path?: string; line?: number } = {}
  ) {
    super(message)
    this.name = 'InputError'
    this.code = code
    this.path = location.path ?? null
    this.line = location.line ?? null
  }
}

/**
 * Best-effort message extraction for values caught from `catch`.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
