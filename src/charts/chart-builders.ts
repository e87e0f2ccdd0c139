import type { Series, SparsePoint } from '../models'
import {
  aggregate,
  bucketFunctionFor,
  buildCandles,
  EmptyInputError,
  partitionGainLoss,
  percentChange,
  sumVolume
} from '../transforms'
import type { CandleSource, Granularity } from '../transforms'
import type { ChartData, ColumnSpec } from './chart-data'
import { alignColumns } from './chart-data'

const PERIOD_ADJECTIVES: Record<Granularity, string> = {
  day: 'daily',
  week: 'weekly',
  month: 'monthly',
  quarter: 'quarterly',
  year: 'yearly'
}

function closePoints(series: Series): SparsePoint[] {
  return series.map(({ timestamp, close }) => ({ timestamp, value: close }))
}

function requireSeries(seriesByTicker: ReadonlyMap<string, Series>, operation: string): void {
  if (seriesByTicker.size === 0) {
    throw new EmptyInputError(operation)
  }
  for (const series of seriesByTicker.values()) {
    if (series.length === 0) {
      throw new EmptyInputError(operation)
    }
  }
}

/**
 * Close price as a single line
 */
export function buildLineChart(ticker: string, series: Series): ChartData {
  if (series.length === 0) {
    throw new EmptyInputError('buildLineChart')
  }

  return {
    kind: 'line',
    title: `${ticker} close`,
    axes: [{ id: 'y', label: 'Price' }],
    columns: [{ name: 'close', axis: 'y', style: 'line' }],
    rows: alignColumns([closePoints(series)])
  }
}

/**
 * Daily close on the left axis, volume summed per period as bars on the right
 */
export function buildPriceVolumeChart(
  ticker: string,
  series: Series,
  granularity: Granularity = 'month'
): ChartData {
  const volume = aggregate(series, bucketFunctionFor(granularity), sumVolume)

  return {
    kind: 'priceVolume',
    title: `${ticker} close and ${PERIOD_ADJECTIVES[granularity]} volume`,
    axes: [
      { id: 'y', label: 'Price' },
      { id: 'y2', label: 'Volume' }
    ],
    columns: [
      { name: 'close', axis: 'y', style: 'line' },
      { name: 'volume', axis: 'y2', style: 'bar' }
    ],
    rows: alignColumns([closePoints(series), volume])
  }
}

/**
 * One close line per ticker on a shared time axis
 */
export function buildMultiSeriesChart(seriesByTicker: ReadonlyMap<string, Series>): ChartData {
  requireSeries(seriesByTicker, 'buildMultiSeriesChart')
  const tickers = [...seriesByTicker.keys()]

  return {
    kind: 'multiSeries',
    title: tickers.join(', '),
    axes: [{ id: 'y', label: 'Price' }],
    columns: tickers.map((ticker): ColumnSpec => ({ name: ticker, axis: 'y', style: 'line' })),
    rows: alignColumns([...seriesByTicker.values()].map(closePoints))
  }
}

/**
 * One percent-change line per ticker, each rebased to its own baseline observation
 */
export function buildPercentChangeChart(
  seriesByTicker: ReadonlyMap<string, Series>,
  baselineIndex = 0
): ChartData {
  requireSeries(seriesByTicker, 'buildPercentChangeChart')
  const tickers = [...seriesByTicker.keys()]

  return {
    kind: 'percentChange',
    title: `${tickers.join(', ')} percent change`,
    axes: [{ id: 'y', label: 'Change (%)' }],
    columns: tickers.map((ticker): ColumnSpec => ({ name: ticker, axis: 'y', style: 'line' })),
    rows: alignColumns(
      [...seriesByTicker.values()].map((series) => closePoints(percentChange(series, baselineIndex)))
    )
  }
}

/**
 * Close split into a green gain region and a red loss region around a break-even price
 * @param breakeven Defaults to the first close
 */
export function buildGainLossChart(ticker: string, series: Series, breakeven?: number): ChartData {
  const { gain, loss } = partitionGainLoss(series, breakeven)
  const threshold = breakeven ?? series[0]?.close

  return {
    kind: 'gainLoss',
    title: `${ticker} gain/loss vs ${String(threshold)}`,
    axes: [{ id: 'y', label: 'Price' }],
    columns: [
      { name: 'gain', axis: 'y', style: 'area', color: 'green' },
      { name: 'loss', axis: 'y', style: 'area', color: 'red' }
    ],
    rows: alignColumns([gain, loss])
  }
}

/**
 * One candle per period
 */
export function buildCandlestickChart(
  ticker: string,
  series: Series,
  granularity: Granularity = 'month',
  source: CandleSource = 'close'
): ChartData {
  const candles = buildCandles(series, bucketFunctionFor(granularity), { source })

  return {
    kind: 'candlestick',
    title: `${ticker} ${PERIOD_ADJECTIVES[granularity]} candles`,
    axes: [{ id: 'y', label: 'Price' }],
    columns: ['open', 'high', 'low', 'close'].map((name): ColumnSpec => ({ name, axis: 'y', style: 'candlestick' })),
    rows: candles.map(({ timestamp, open, high, low, close }) => ({
      timestamp,
      values: [open, high, low, close]
    }))
  }
}
