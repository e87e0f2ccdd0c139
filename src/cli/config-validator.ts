import type { ChartsConfig } from '../interfaces'
import { chartsConfigSchema } from '../interfaces'

/**
 * One problem found in a configuration
 */
export interface ConfigIssue {
  /** Dot-notation path of the offending property, '' for the root */
  field: string
  message: string
}

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.field || '(root)'}: ${issue.message}`).join('; ')}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Config validator backed by the chart configuration schema
 */
export class ConfigValidator {
  /**
   * Validate a chart configuration, filling in defaults
   * @param config Raw configuration object
   * @returns Validated configuration
   * @throws ConfigValidationError listing every issue
   */
  public static validate(config: unknown): ChartsConfig {
    const result = this.validateWithDetails(config)
    if (!result.isValid) {
      throw new ConfigValidationError(result.errors)
    }
    return result.config
  }

  /**
   * Validate without throwing
   */
  public static validateWithDetails(config: unknown):
    | { isValid: true; config: ChartsConfig; warnings: string[] }
    | { isValid: false; errors: ConfigIssue[] } {
    const parsed = chartsConfigSchema.safeParse(config)
    if (!parsed.success) {
      return {
        isValid: false,
        errors: parsed.error.issues.map((issue) => ({
          field: issue.path.map(String).join('.'),
          message: issue.message
        }))
      }
    }

    const warnings: string[] = []
    const crossTicker = parsed.data.charts.filter(
      (chart) => chart.type === 'multiSeries' || chart.type === 'percentChange'
    )
    if (parsed.data.tickers.length === 1 && crossTicker.length > 0) {
      warnings.push('multiSeries and percentChange charts compare tickers but only one is configured')
    }

    return { isValid: true, config: parsed.data, warnings }
  }
}
