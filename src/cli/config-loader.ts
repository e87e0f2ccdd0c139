import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax; unset variables expand to ''
 */
export function expandEnvironmentVariables(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return env[varName] || ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return env[varName] || ''
    })
}

/**
 * Recursively expands environment variables in an object
 */
export function expandObjectEnvironmentVariables(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return expandEnvironmentVariables(obj, env)
  }

  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => expandObjectEnvironmentVariables(item, env))
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value, env)
    }
    return expanded
  }

  return obj
}

/**
 * Creates a default chart configuration
 * Useful for initialization or as a template
 */
export function createDefaultChartsConfig(): Record<string, unknown> {
  return {
    input: {
      type: 'csv',
      path: './data/{ticker}.csv'
    },
    tickers: ['AAPL'],
    charts: [
      { type: 'line' },
      { type: 'priceVolume', granularity: 'month' },
      { type: 'multiSeries' },
      { type: 'percentChange', baselineIndex: 0 },
      { type: 'gainLoss' },
      { type: 'candlestick', granularity: 'month', source: 'close' }
    ],
    output: {
      path: './charts',
      format: 'json'
    }
  }
}

/**
 * Reads chart configuration files
 */
export class ConfigLoader {
  /**
   * Loads and parses a configuration file, expanding environment variables
   * Structure is checked later by ConfigValidator
   * @param configPath Path to the configuration file (absolute or relative)
   * @throws ConfigLoadError if the file cannot be read or is not valid JSON
   */
  public static async load(configPath: string): Promise<unknown> {
    // Resolve path (convert relative to absolute)
    const resolvedPath = isAbsolute(configPath)
      ? configPath
      : resolve(process.cwd(), configPath)

    let rawContent: string
    try {
      rawContent = await readFile(resolvedPath, 'utf-8')
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read configuration file: ${resolvedPath}`,
        resolvedPath,
        error instanceof Error ? error : undefined
      )
    }

    // Parse JSON
    let parsedConfig: unknown
    try {
      parsedConfig = JSON.parse(rawContent)
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
        resolvedPath,
        error instanceof Error ? error : undefined
      )
    }

    return expandObjectEnvironmentVariables(parsedConfig)
  }
}
