/**
 * Structured Logger
 *
 * Simple, zero-dependency logger for tfvar-sync.
 * - Dev: colorized console output with timestamps
 * - Production: JSON structured output for log aggregation
 *
 * Log lines go to stderr so that stdout only carries the CLI's own report.
 */

import { ENV } from './constants'

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LogEntry {
  level: LogLevel
  message: string
  name: string
  timestamp: string
  data?: unknown
}

// =============================================================================
// Level Config
// =============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info: '\x1b[36m',    // cyan
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
}

const RESET = '\x1b[0m'
const BOLD = '\x1b[1m'
const DIM = '\x1b[2m'

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// =============================================================================
// Environment Detection
// =============================================================================

const isDev = process.env.NODE_ENV !== 'production'

function initialLevel(): LogLevel {
  const fromEnv = process.env[ENV.LOG_LEVEL]
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  // Warnings (ignored variables) and errors are always shown
  return 'warn'
}

let minLevel: LogLevel = initialLevel()

/**
 * Change the minimum level for every logger. The CLI lowers it to 'info'
 * when --info-log is passed.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level
}

export function getLogLevel(): LogLevel {
  return minLevel
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private name: string

  constructor(name: string) {
    this.name = name
  }

  child(childName: string): Logger {
    return new Logger(`${this.name}:${childName}`)
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return

    const entry: LogEntry = {
      level,
      message,
      name: this.name,
      timestamp: new Date().toISOString(),
      ...(data !== undefined ? { data } : {}),
    }

    if (isDev) {
      this.devOutput(entry)
    } else {
      this.jsonOutput(entry)
    }
  }

  private devOutput(entry: LogEntry): void {
    const color = LEVEL_COLORS[entry.level]
    const time = entry.timestamp.slice(entry.timestamp.indexOf('T') + 1).replace('Z', '')
    const prefix = `${DIM}${time}${RESET} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${BOLD}[${entry.name}]${RESET}`

    if (entry.data !== undefined) {
      console.error(`${prefix} ${entry.message}`, entry.data)
    } else {
      console.error(`${prefix} ${entry.message}`)
    }
  }

  private jsonOutput(entry: LogEntry): void {
    console.error(JSON.stringify(entry))
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createLogger(name: string): Logger {
  return new Logger(name)
}

