import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import { runTrial } from '../src/demo'
import { SystemMonitor } from '../src/monitor'
import { mathError } from '../src/utils/calculator'

vi.mock('@actions/core', () => ({ info: vi.fn() }))

function createLogger() {
  return {
    log: vi.fn(),
    logException: vi.fn(),
    logMetrics: vi.fn()
  }
}

describe('runTrial', () => {
  beforeEach(() => {
    vi.mocked(core.info).mockClear()
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.mocked(console.error).mockRestore()
  })

  it('should record a zero divisor as a failure', () => {
    const logger = createLogger()
    const monitor = new SystemMonitor(logger)

    runTrial({ a: 10, b: 0 }, logger, monitor)

    expect(monitor.getTally()).toEqual({ total: 1, successes: 0, failures: 1 })
    expect(console.error).toHaveBeenCalledWith('✗ Error: Division by zero detected.')
    expect(logger.log.mock.calls).toEqual([['INFO', 'Attempting to divide 10 / 0']])
    expect(logger.logException).toHaveBeenCalledWith(mathError('DivisionByZero'))
    expect(core.info).not.toHaveBeenCalled()
  })

  it('should record a negative dividend as a failure', () => {
    const logger = createLogger()
    const monitor = new SystemMonitor(logger)

    runTrial({ a: -5, b: 2 }, logger, monitor)

    expect(monitor.getTally()).toEqual({ total: 1, successes: 0, failures: 1 })
    expect(console.error).toHaveBeenCalledWith(
      '✗ Error: Negative number not allowed in this operation.'
    )
    expect(logger.log.mock.calls).toEqual([['INFO', 'Attempting to divide -5 / 2']])
    expect(logger.logException).toHaveBeenCalledWith(mathError('NegativeOperand'))
  })

  it('should record a valid division as a success', () => {
    const logger = createLogger()
    const monitor = new SystemMonitor(logger)

    runTrial({ a: 100, b: 5 }, logger, monitor)

    expect(monitor.getTally()).toEqual({ total: 1, successes: 1, failures: 0 })
    expect(vi.mocked(core.info).mock.calls).toEqual([['✓ Result: 20']])
    expect(logger.log.mock.calls).toEqual([
      ['INFO', 'Attempting to divide 100 / 5'],
      ['INFO', 'Operation successful: 100 / 5 = 20']
    ])
    expect(logger.logException).not.toHaveBeenCalled()
    expect(console.error).not.toHaveBeenCalled()
  })
})
