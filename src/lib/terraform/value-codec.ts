/**
 * Value Codec
 *
 * Maps Terraform output values to the (hcl, value) pair the workspace
 * variables API stores, and back.
 *
 * - Scalars (bool, number, string) are sent as plain values with hcl=false.
 * - Collections and null are sent as HCL expressions (hcl=true). JSON text is
 *   valid HCL for these, so the remote side parses them back into typed
 *   lists/maps instead of opaque strings.
 * - Strings travel verbatim; everything else travels as compact JSON.
 * - Numbers keep the text they were written with, so integers past 2^53 and
 *   long fractions are exported exactly as Terraform printed them.
 */

import { LosslessNumber, parse as parseLossless } from 'lossless-json'

// =============================================================================
// Types
// =============================================================================

export type Value =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'integer'; readonly text: string }
  | { readonly kind: 'float'; readonly text: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'array'; readonly items: readonly Value[] }
  | { readonly kind: 'object'; readonly entries: readonly (readonly [string, Value])[] }

export type ValueKind = Value['kind']

export interface Classification {
  /** bool, integer, float or string */
  isPrimitive: boolean
  isString: boolean
  /** Sent as an HCL expression: the negation of isPrimitive */
  isHCL: boolean
}

export class CodecError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CodecError'
  }
}

// =============================================================================
// Constructors
// =============================================================================

const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/
const JSON_INTEGER = /^-?(?:0|[1-9]\d*)$/

function numberFromText(text: string): Value {
  if (!JSON_NUMBER.test(text)) {
    throw new CodecError(`Invalid number ${JSON.stringify(text)}`)
  }
  return JSON_INTEGER.test(text) ? { kind: 'integer', text } : { kind: 'float', text }
}

export const Values = {
  null: (): Value => ({ kind: 'null' }),
  boolean: (value: boolean): Value => ({ kind: 'boolean', value }),
  number: (value: number): Value => numberFromText(String(value)),
  /** A number from its JSON text, kept digit for digit */
  numberText: numberFromText,
  string: (value: string): Value => ({ kind: 'string', value }),
  array: (items: readonly Value[]): Value => ({ kind: 'array', items }),
  object: (entries: readonly (readonly [string, Value])[]): Value => ({ kind: 'object', entries }),
}

/**
 * Parse JSON text without going through IEEE doubles. Numbers come back as
 * LosslessNumber instances, which fromJson() turns into number Values.
 */
export function parseJsonText(text: string): unknown {
  return parseLossless(text)
}

/**
 * Convert a parsed JSON document into a Value.
 *
 * This is the only place that inspects runtime types; everything past it
 * matches on `kind`.
 */
export function fromJson(input: unknown, path = '$'): Value {
  if (input === null) return Values.null()
  if (input instanceof LosslessNumber) return Values.numberText(input.value)

  switch (typeof input) {
    case 'boolean':
      return Values.boolean(input)
    case 'number':
      if (!Number.isFinite(input)) {
        throw new CodecError(`Non-finite number at ${path}`)
      }
      return Values.number(input)
    case 'bigint':
      return Values.numberText(input.toString())
    case 'string':
      return Values.string(input)
    case 'object': {
      if (Array.isArray(input)) {
        return Values.array(input.map((item: unknown, i) => fromJson(item, `${path}[${i}]`)))
      }
      const entries = Object.entries(input).map(
        ([key, item]): readonly [string, Value] => [key, fromJson(item, `${path}.${key}`)]
      )
      return Values.object(entries)
    }
    default:
      throw new CodecError(`Unsupported ${typeof input} at ${path}`)
  }
}

/**
 * Plain JavaScript form of a Value (what JSON.parse would have produced).
 * Numbers become doubles here; use toJsonText() to keep their digits.
 */
export function toJson(value: Value): unknown {
  switch (value.kind) {
    case 'null':
      return null
    case 'integer':
    case 'float':
      return Number(value.text)
    case 'boolean':
    case 'string':
      return value.value
    case 'array':
      return value.items.map(toJson)
    case 'object': {
      const out: Record<string, unknown> = {}
      for (const [key, item] of value.entries) {
        out[key] = toJson(item)
      }
      return out
    }
  }
}

// =============================================================================
// Classification
// =============================================================================

export function classify(value: Value): Classification {
  switch (value.kind) {
    case 'boolean':
    case 'integer':
    case 'float':
      return { isPrimitive: true, isString: false, isHCL: false }
    case 'string':
      return { isPrimitive: true, isString: true, isHCL: false }
    case 'null':
    case 'array':
    case 'object':
      return { isPrimitive: false, isString: false, isHCL: true }
  }
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Compact JSON text. Object entries keep their order; numbers are written
 * with their original text.
 */
export function toJsonText(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'null'
    case 'boolean':
      return value.value ? 'true' : 'false'
    case 'integer':
    case 'float':
      return value.text
    case 'string':
      return JSON.stringify(value.value)
    case 'array':
      return `[${value.items.map(toJsonText).join(',')}]`
    case 'object':
      return `{${value.entries
        .map(([key, item]) => `${JSON.stringify(key)}:${toJsonText(item)}`)
        .join(',')}}`
  }
}

export function encode(value: Value): string {
  return value.kind === 'string' ? value.value : toJsonText(value)
}

/**
 * Inverse of encode(). `isHCL` is accepted for symmetry with the wire pair;
 * the string/JSON decision only depends on `isString`.
 */
export function decode(isHCL: boolean, isString: boolean, rawValue: string): Value {
  if (isString) return Values.string(rawValue)

  let parsed: unknown
  try {
    parsed = parseJsonText(rawValue)
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'invalid JSON'
    throw new CodecError(
      `Cannot decode ${isHCL ? 'HCL' : 'primitive'} value ${JSON.stringify(truncate(rawValue))}: ${reason}`
    )
  }
  return fromJson(parsed)
}

// =============================================================================
// Comparison & Display
// =============================================================================

/**
 * Structural equality. Object key order is not significant, since the remote
 * side is free to reorder map keys.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null'
    case 'boolean':
    case 'string':
      return b.kind === a.kind && b.value === a.value
    case 'integer':
    case 'float':
      return (
        (b.kind === 'integer' || b.kind === 'float') && normalizeNumberText(a.text) === normalizeNumberText(b.text)
      )
    case 'array': {
      if (b.kind !== 'array' || b.items.length !== a.items.length) return false
      const others = b.items
      return a.items.every((item, i) => valuesEqual(item, others[i]))
    }
    case 'object': {
      if (b.kind !== 'object' || b.entries.length !== a.entries.length) return false
      const other = new Map<string, Value>(b.entries)
      return a.entries.every(([key, item]) => {
        const match = other.get(key)
        return match !== undefined && valuesEqual(item, match)
      })
    }
  }
}

/**
 * Scientific form with no redundant digits, so `1`, `1.0` and `10e-1` all
 * read `1e0`. Works on the text; no precision is lost.
 */
export function normalizeNumberText(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/.exec(text)
  if (!match) return text

  const [, sign, whole, fraction = '', exponent = '0'] = match
  let digits = `${whole}${fraction}`.replace(/^0+/, '')
  if (digits === '') return '0e0'

  let power = Number(exponent) - fraction.length
  const trailing = /0+$/.exec(digits)
  if (trailing) {
    digits = digits.slice(0, -trailing[0].length)
    power += trailing[0].length
  }
  return `${sign}${digits}e${power}`
}

/** Compact, single-line rendering for logs and reports. */
export function describeValue(value: Value, maxLength = 80): string {
  return truncate(toJsonText(value), maxLength)
}

function truncate(text: string, maxLength = 80): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}…` : text
}
