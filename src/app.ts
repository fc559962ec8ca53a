import * as path from 'path'
import { loadConfig } from './config'
import { runDemo } from './demo'
import { LOG_FILE, withLogger } from './logger'
import { SystemMonitor } from './monitor'
import type { BatchOptions } from './batch'
import type { LoggerOptions } from './logger'

export interface RunOptions extends LoggerOptions {
  /** Directory searched for .arith-monitor/config.yml */
  cwd?: string
  /** Pause implementation for the batch stage */
  sleep?: BatchOptions['sleep']
}

/**
 * Main entry point
 * Resolves to the process exit code
 */
export async function run(options: RunOptions = {}): Promise<number> {
  const { cwd, sleep, ...loggerOptions } = options

  try {
    const config = await loadConfig(cwd)

    const logPath = path.resolve(cwd ?? process.cwd(), LOG_FILE)

    await withLogger(
      logPath,
      async logger => {
        const monitor = new SystemMonitor(logger)
        await runDemo(logger, monitor, {
          logFile: LOG_FILE,
          delayMs: config.delayMs,
          sleep
        })
      },
      loggerOptions
    )

    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error(`Critical system error: ${message}`)
    return 1
  }
}
