import * as core from '@actions/core'
import { successRate } from './utils/calculator'
import type { FileLogger } from './logger'
import type { Tally } from './types'

/**
 * In-memory success/failure counters for the process lifetime
 */
export class SystemMonitor {
  private total = 0
  private successes = 0
  private failures = 0

  constructor(private readonly logger: Pick<FileLogger, 'logMetrics'>) {}

  recordSuccess(): void {
    this.total++
    this.successes++
  }

  recordFailure(): void {
    this.total++
    this.failures++
  }

  getTally(): Tally {
    return {
      total: this.total,
      successes: this.successes,
      failures: this.failures
    }
  }

  /**
   * Print the metrics block and write the matching log entry
   */
  showMetrics(): void {
    core.info('')
    core.info('========== SYSTEM METRICS ==========')
    core.info(`Total operations: ${this.total}`)
    core.info(`Successful operations: ${this.successes}`)
    core.info(`Failed operations: ${this.failures}`)
    if (this.total > 0) {
      core.info(`Success rate: ${successRate(this.successes, this.total).toFixed(2)}%`)
    }
    core.info('====================================')

    this.logger.logMetrics(this.total, this.successes, this.failures)
  }
}
