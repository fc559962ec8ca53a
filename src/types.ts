/**
 * Severity levels written to the log file
 * Every level is written, there is no filtering
 */
export type LogLevel = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL' | 'DEBUG'

/**
 * Ways a validated arithmetic operation can fail
 */
export type MathErrorKind = 'DivisionByZero' | 'NegativeOperand' | 'InvalidInput'

/**
 * Failure of a validated arithmetic operation
 */
export interface MathError {
  /** Which rule rejected the input */
  kind: MathErrorKind
  /** Human-readable message printed to the console and the log */
  message: string
}

/**
 * Outcome of a validated arithmetic operation
 */
export type MathResult =
  | { ok: true; value: number }
  | { ok: false; error: MathError }

/**
 * Input to a single division trial
 */
export interface OperandPair {
  readonly a: number
  readonly b: number
}

/**
 * Snapshot of the outcome counters
 * Invariant: total === successes + failures
 */
export interface Tally {
  total: number
  successes: number
  failures: number
}

/**
 * Configuration loaded from .arith-monitor/config.yml
 */
export interface Config {
  /** Pause between batch items, in milliseconds */
  delayMs: number
}
