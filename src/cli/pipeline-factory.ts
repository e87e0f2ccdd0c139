import type { ChartsConfig } from '../interfaces'
import { ChartPipeline } from '../pipeline'
import { createDataSource, toDateRange } from '../providers'
import { createChartRepository } from '../repositories'
import { ConfigLoader } from './config-loader'
import { ConfigValidator } from './config-validator'

/**
 * Builds chart pipelines from configuration
 */
export class PipelineFactory {
  /**
   * Create a pipeline from a validated configuration
   */
  public static create(config: ChartsConfig): ChartPipeline {
    return new ChartPipeline({
      source: createDataSource(config.input),
      repository: createChartRepository(config.output),
      tickers: config.tickers,
      charts: config.charts,
      range: toDateRange(config.range)
    })
  }

  /**
   * Load, validate and build in one step
   */
  public static async fromFile(configPath: string): Promise<ChartPipeline> {
    const config = ConfigValidator.validate(await ConfigLoader.load(configPath))
    return this.create(config)
  }
}
