import type { ChartData } from '../charts'
import {
  buildCandlestickChart,
  buildGainLossChart,
  buildLineChart,
  buildMultiSeriesChart,
  buildPercentChangeChart,
  buildPriceVolumeChart
} from '../charts'
import type { ChartRequest } from '../interfaces/chart-config.interface'
import type { DataSource, DateRange } from '../interfaces/data-source.interface'
import type { Series } from '../models'
import type { ChartRepository } from '../repositories'
import logger from '../utils/logger'

/**
 * Chart pipeline configuration
 */
export interface ChartPipelineConfig {
  /** Where series come from */
  source: DataSource
  /** Where charts go */
  repository: ChartRepository
  /** Tickers to chart, in display order */
  tickers: string[]
  /** Charts to build */
  charts: ChartRequest[]
  /** Optional date filter applied when loading */
  range?: DateRange
}

/**
 * Pipeline execution result
 */
export interface ChartPipelineResult {
  /** Number of tickers loaded */
  tickers: number
  /** Number of charts written */
  chartsWritten: number
  /** Paths of the written charts, in write order */
  paths: string[]
  /** Execution time in milliseconds */
  executionTime: number
}

/**
 * Progress callback function
 */
export type ProgressCallback = (progress: { current: number; total: number; message: string }) => void

/**
 * Loads each ticker once, builds the requested charts and saves them
 * Per-ticker charts are named `<ticker>-<kind>`, cross-ticker charts `<kind>`
 */
export class ChartPipeline {
  private readonly config: ChartPipelineConfig
  private progressCallback?: ProgressCallback

  constructor(config: ChartPipelineConfig) {
    this.config = config
  }

  /**
   * Set progress callback
   */
  public onProgress(callback: ProgressCallback): ChartPipeline {
    this.progressCallback = callback
    return this
  }

  /**
   * Execute the pipeline
   */
  public async execute(): Promise<ChartPipelineResult> {
    const startTime = Date.now()
    const { source, repository, tickers, charts, range } = this.config

    const seriesByTicker = new Map<string, Series>()
    for (const ticker of tickers) {
      seriesByTicker.set(ticker, await source.getSeries(ticker, range))
    }

    const planned = this.plan(seriesByTicker, charts)
    const paths: string[] = []

    for (const [index, { name, build }] of planned.entries()) {
      try {
        paths.push(await repository.save(name, build()))
      } catch (error) {
        logger.error('Chart failed', { chart: name, error: error instanceof Error ? error.message : String(error) })
        throw error
      }
      this.progressCallback?.({ current: index + 1, total: planned.length, message: name })
    }

    const result: ChartPipelineResult = {
      tickers: seriesByTicker.size,
      chartsWritten: paths.length,
      paths,
      executionTime: Date.now() - startTime
    }
    logger.info('Chart pipeline completed', result)
    return result
  }

  /**
   * Expands chart requests into named build steps
   */
  private plan(
    seriesByTicker: ReadonlyMap<string, Series>,
    charts: readonly ChartRequest[]
  ): { name: string; build: () => ChartData }[] {
    const steps: { name: string; build: () => ChartData }[] = []

    for (const request of charts) {
      switch (request.type) {
        case 'multiSeries':
          steps.push({ name: request.type, build: () => buildMultiSeriesChart(seriesByTicker) })
          break

        case 'percentChange':
          steps.push({
            name: request.type,
            build: () => buildPercentChangeChart(seriesByTicker, request.baselineIndex)
          })
          break

        default:
          for (const [ticker, series] of seriesByTicker) {
            steps.push({ name: `${ticker}-${request.type}`, build: () => buildTickerChart(ticker, series, request) })
          }
      }
    }

    return steps
  }
}

function buildTickerChart(
  ticker: string,
  series: Series,
  request: Exclude<ChartRequest, { type: 'multiSeries' | 'percentChange' }>
): ChartData {
  switch (request.type) {
    case 'line':
      return buildLineChart(ticker, series)
    case 'priceVolume':
      return buildPriceVolumeChart(ticker, series, request.granularity)
    case 'gainLoss':
      return buildGainLossChart(ticker, series, request.breakeven)
    case 'candlestick':
      return buildCandlestickChart(ticker, series, request.granularity, request.source)
  }
}
