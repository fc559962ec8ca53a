import * as core from '@actions/core'
import { processPairs } from './batch'
import { divide } from './utils/calculator'
import type { BatchOptions } from './batch'
import type { FileLogger } from './logger'
import type { SystemMonitor } from './monitor'
import type { OperandPair } from './types'

/**
 * Pairs fed to the real-time processing stage
 * Four valid divisions, two zero divisors, two negative operands
 */
export const DEMO_PAIRS: readonly OperandPair[] = [
  { a: 100, b: 5 },
  { a: 50, b: 0 },
  { a: 81, b: 9 },
  { a: -10, b: 2 },
  { a: 200, b: 10 },
  { a: 7, b: 0 },
  { a: 144, b: 12 },
  { a: -50, b: -5 }
]

const TRIALS: ReadonlyArray<{ title: string; pair: OperandPair }> = [
  { title: 'TEST 1: Division by zero', pair: { a: 10, b: 0 } },
  { title: 'TEST 2: Negative numbers', pair: { a: -5, b: 2 } },
  { title: 'TEST 3: Valid division', pair: { a: 100, b: 5 } }
]

function banner(text: string): void {
  core.info('========================================')
  core.info(`  ${text}`)
  core.info('========================================')
}

/**
 * Run one division and record its outcome
 */
export function runTrial(
  { a, b }: OperandPair,
  logger: Pick<FileLogger, 'log' | 'logException'>,
  monitor: Pick<SystemMonitor, 'recordSuccess' | 'recordFailure'>
): void {
  logger.log('INFO', `Attempting to divide ${a} / ${b}`)

  const result = divide(a, b)
  if (result.ok) {
    core.info(`✓ Result: ${result.value}`)
    logger.log('INFO', `Operation successful: ${a} / ${b} = ${result.value}`)
    monitor.recordSuccess()
    return
  }

  console.error(`✗ ${result.error.message}`)
  logger.logException(result.error)
  monitor.recordFailure()
}

export interface DemoOptions extends BatchOptions {
  /** Log file name mentioned in the closing message */
  logFile: string
}

/**
 * Full demonstration: three single trials, the batch, then the metrics
 */
export async function runDemo(
  logger: FileLogger,
  monitor: SystemMonitor,
  options: DemoOptions
): Promise<void> {
  const { logFile, ...batchOptions } = options

  banner('MONITORING AND LOGGING SYSTEM')

  for (const trial of TRIALS) {
    core.info('')
    core.info(`--- ${trial.title} ---`)
    runTrial(trial.pair, logger, monitor)
  }

  await processPairs(DEMO_PAIRS, logger, monitor, batchOptions)

  monitor.showMetrics()

  core.info('')
  core.info(`✓ Check the file '${logFile}' for the complete records.`)
  core.info('')
  banner('EXECUTION COMPLETED')
}
