import * as fs from 'fs'
import { successRate } from './utils/calculator'
import type { LogLevel } from './types'

/**
 * Thrown when the log destination cannot be opened for appending
 */
export class LogOpenError extends Error {
  readonly path: string

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Could not open log file: ${path}`, options)
    this.name = 'LogOpenError'
    this.path = path
  }
}

/** Fixed name of the log file, relative to the working directory */
export const LOG_FILE = 'system.log'

export interface LoggerOptions {
  /** Clock used for entry timestamps */
  now?: () => Date
}

const pad = (n: number) => String(n).padStart(2, '0')

/**
 * Format a date as local `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

export function formatLogLine(date: Date, level: LogLevel, message: string): string {
  return `[${formatTimestamp(date)}] [${level}] ${message}\n`
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message
  }
  return String(err)
}

/**
 * Append-only text logger
 * Owns one file descriptor from construction until close()
 */
export class FileLogger {
  readonly path: string
  private fd: number | null
  private readonly now: () => Date

  constructor(path: string, options: LoggerOptions = {}) {
    this.path = path
    this.now = options.now ?? (() => new Date())

    try {
      this.fd = fs.openSync(path, 'a')
    } catch (error) {
      throw new LogOpenError(path, { cause: error })
    }

    try {
      this.log('INFO', 'System started')
    } catch (error) {
      this.release()
      throw new LogOpenError(path, { cause: error })
    }
  }

  get closed(): boolean {
    return this.fd === null
  }

  /**
   * Append one entry and flush it to storage before returning
   */
  log(level: LogLevel, message: string): void {
    if (this.fd === null) {
      throw new Error(`Logger for ${this.path} is closed`)
    }
    fs.writeSync(this.fd, formatLogLine(this.now(), level, message))
    fs.fsyncSync(this.fd)
  }

  logException(err: unknown): void {
    this.log('ERROR', `Exception caught: ${describeError(err)}`)
  }

  logMetrics(total: number, success: number, failed: number): void {
    const rate = successRate(success, total).toFixed(2)
    this.log(
      'INFO',
      `Metrics - Total: ${total} | Successful: ${success} | Failed: ${failed} | Success rate: ${rate}%`
    )
  }

  /**
   * Write the final entry and release the file
   * Safe to call more than once; only the first call writes
   */
  close(): void {
    if (this.fd === null) {
      return
    }
    try {
      this.log('INFO', 'System finished')
    } finally {
      this.release()
    }
  }

  private release(): void {
    if (this.fd === null) {
      return
    }
    const fd = this.fd
    this.fd = null
    fs.closeSync(fd)
  }
}

/**
 * Open a logger for the duration of fn and always close it afterwards
 * When fn fails, a failing close is reported and fn's error is rethrown
 */
export async function withLogger<T>(
  path: string,
  fn: (logger: FileLogger) => Promise<T>,
  options: LoggerOptions = {}
): Promise<T> {
  const logger = new FileLogger(path, options)

  let result: T
  try {
    result = await fn(logger)
  } catch (error) {
    try {
      logger.close()
    } catch (closeError) {
      console.warn(`Failed to close log file ${path}: ${describeError(closeError)}`)
    }
    throw error
  }

  logger.close()
  return result
}
