import * as fs from 'fs'
import * as path from 'path'
import * as yaml from 'yaml'
import type { Config } from './types'

const CONFIG_PATHS = [
  '.arith-monitor/config.yml',
  '.arith-monitor/config.yaml'
]

/**
 * Load configuration from the working directory
 * Looks for config file in standard locations
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<Config> {
  for (const configPath of CONFIG_PATHS) {
    const fullPath = path.join(cwd, configPath)
    if (fs.existsSync(fullPath)) {
      try {
        const content = fs.readFileSync(fullPath, 'utf-8')
        const parsed: unknown = yaml.parse(content)
        if (validateConfig(parsed)) {
          return normalizeConfig(parsed)
        }
        console.warn(`Ignoring invalid config at ${configPath}`)
      } catch (error) {
        // Log warning but continue with defaults
        console.warn(`Failed to parse config at ${configPath}:`, error)
      }
    }
  }

  return getDefaultConfig()
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): Config {
  return {
    delayMs: 500
  }
}

function normalizeConfig(config: Partial<Config> | null | undefined): Config {
  const defaults = getDefaultConfig()

  return {
    delayMs: config?.delayMs ?? defaults.delayMs
  }
}

/**
 * Validate that config file is well-formed
 * An empty file parses to null and counts as valid
 */
export function validateConfig(config: unknown): config is Partial<Config> | null | undefined {
  if (config === null || config === undefined) {
    return true
  }
  if (typeof config !== 'object' || Array.isArray(config)) {
    return false
  }

  const c = config as Record<string, unknown>

  if (c.delayMs !== undefined) {
    if (typeof c.delayMs !== 'number' || !Number.isFinite(c.delayMs) || c.delayMs < 0) {
      return false
    }
  }

  return true
}
