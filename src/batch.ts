import * as core from '@actions/core'
import { setTimeout as wait } from 'timers/promises'
import { divide } from './utils/calculator'
import type { FileLogger } from './logger'
import type { SystemMonitor } from './monitor'
import type { MathResult, OperandPair } from './types'

export const DEFAULT_DELAY_MS = 500

export interface BatchOptions {
  /** Pause after each pair, in milliseconds */
  delayMs?: number
  /** Pause implementation, replaced in tests */
  sleep?: (ms: number) => Promise<void>
  /** Operation applied to each pair */
  operation?: (a: number, b: number) => MathResult
}

async function defaultSleep(ms: number): Promise<void> {
  await wait(ms)
}

/**
 * Process operand pairs strictly in order
 * A failing pair is recorded and never stops the batch
 */
export async function processPairs(
  pairs: readonly OperandPair[],
  logger: Pick<FileLogger, 'log' | 'logException'>,
  monitor: Pick<SystemMonitor, 'recordSuccess' | 'recordFailure'>,
  options: BatchOptions = {}
): Promise<void> {
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS
  const sleep = options.sleep ?? defaultSleep
  const operation = options.operation ?? divide

  core.info('')
  core.info('===== REAL-TIME PROCESSING =====')
  logger.log('INFO', 'Starting number list processing')

  for (const [index, { a, b }] of pairs.entries()) {
    core.info('')
    core.info(`Operation #${index + 1}: ${a} / ${b}`)
    logger.log('DEBUG', `Processing operation: ${a} / ${b}`)

    try {
      const result = operation(a, b)
      if (result.ok) {
        core.info(`✓ Result: ${result.value}`)
        logger.log('INFO', `Operation successful. Result: ${result.value}`)
        monitor.recordSuccess()
      } else {
        console.error(`✗ ${result.error.message}`)
        logger.logException(result.error)
        monitor.recordFailure()
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`✗ Unexpected exception: ${message}`)
      logger.logException(error)
      monitor.recordFailure()
    }

    await sleep(delayMs)
  }

  logger.log('INFO', 'Number list processing completed')
}
