import type { MathError, MathErrorKind, MathResult } from '../types'

const MESSAGES: Record<MathErrorKind, string> = {
  DivisionByZero: 'Error: Division by zero detected.',
  NegativeOperand: 'Error: Negative number not allowed in this operation.',
  // Not raised by any current operation; kept for input parsing
  InvalidInput: 'Error: Non-numeric input detected.'
}

/**
 * Build the error value for a given kind
 */
export function mathError(kind: MathErrorKind): MathError {
  return { kind, message: MESSAGES[kind] }
}

function fail(kind: MathErrorKind): MathResult {
  return { ok: false, error: mathError(kind) }
}

/**
 * Divide a by b
 * Rejects a zero divisor first, then any negative operand
 */
export function divide(a: number, b: number): MathResult {
  if (b === 0) {
    return fail('DivisionByZero')
  }
  if (a < 0 || b < 0) {
    return fail('NegativeOperand')
  }
  return { ok: true, value: a / b }
}

/**
 * Non-negative square root of x
 */
export function sqrt(x: number): MathResult {
  if (x < 0) {
    return fail('NegativeOperand')
  }
  return { ok: true, value: Math.sqrt(x) }
}

/**
 * Share of successful operations as a percentage
 * Returns 0 for an empty tally instead of dividing by zero
 */
export function successRate(successes: number, total: number): number {
  if (total === 0) {
    return 0
  }
  return (successes * 100) / total
}
