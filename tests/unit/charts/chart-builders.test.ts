import { deepStrictEqual, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import {
  buildCandlestickChart,
  buildGainLossChart,
  buildLineChart,
  buildMultiSeriesChart,
  buildPercentChangeChart,
  buildPriceVolumeChart
} from '../../../src/charts'
import type { Observation, Series } from '../../../src/models'
import { EmptyInputError } from '../../../src/transforms'
import { closes, day } from '../../helpers/series-fixtures'

describe('Chart builders', () => {
  describe('buildLineChart', () => {
    it('should plot close on one axis', () => {
      const chart = buildLineChart('XYZ', closes([10, 11]))
      strictEqual(chart.kind, 'line')
      strictEqual(chart.title, 'XYZ close')
      deepStrictEqual(chart.columns, [{ name: 'close', axis: 'y', style: 'line' }])
      deepStrictEqual(chart.rows, [
        { timestamp: day('2020-01-01'), values: [10] },
        { timestamp: day('2020-01-02'), values: [11] }
      ])
    })

    it('should throw on an empty series', () => {
      throws(() => buildLineChart('XYZ', []), EmptyInputError)
    })
  })

  describe('buildPriceVolumeChart', () => {
    it('should put period volume on the secondary axis', () => {
      const series: Observation[] = [
        { timestamp: day('2020-01-02'), close: 10, volume: 100 },
        { timestamp: day('2020-01-03'), close: 11, volume: 200 },
        { timestamp: day('2020-02-03'), close: 12, volume: 50 }
      ]
      const chart = buildPriceVolumeChart('XYZ', series)

      strictEqual(chart.title, 'XYZ close and monthly volume')
      deepStrictEqual(chart.axes.map((axis) => axis.id), ['y', 'y2'])
      deepStrictEqual(chart.columns[1], { name: 'volume', axis: 'y2', style: 'bar' })
      deepStrictEqual(chart.rows, [
        { timestamp: Date.UTC(2020, 0, 1), values: [null, 300] },
        { timestamp: day('2020-01-02'), values: [10, null] },
        { timestamp: day('2020-01-03'), values: [11, null] },
        { timestamp: Date.UTC(2020, 1, 1), values: [null, 50] },
        { timestamp: day('2020-02-03'), values: [12, null] }
      ])
    })

    it('should name the granularity in the title', () => {
      strictEqual(buildPriceVolumeChart('XYZ', closes([1]), 'quarter').title, 'XYZ close and quarterly volume')
    })
  })

  describe('buildMultiSeriesChart', () => {
    it('should align one column per ticker', () => {
      const chart = buildMultiSeriesChart(
        new Map<string, Series>([
          ['AAA', closes([1, 2])],
          ['BBB', closes([5], '2020-01-02')]
        ])
      )

      strictEqual(chart.title, 'AAA, BBB')
      deepStrictEqual(chart.columns.map((column) => column.name), ['AAA', 'BBB'])
      deepStrictEqual(chart.rows, [
        { timestamp: day('2020-01-01'), values: [1, null] },
        { timestamp: day('2020-01-02'), values: [2, 5] }
      ])
    })

    it('should throw on no tickers or an empty series', () => {
      throws(() => buildMultiSeriesChart(new Map()), EmptyInputError)
      throws(() => buildMultiSeriesChart(new Map([['AAA', []]])), EmptyInputError)
    })
  })

  describe('buildPercentChangeChart', () => {
    it('should rebase each ticker to its own baseline', () => {
      const chart = buildPercentChangeChart(
        new Map<string, Series>([
          ['AAA', closes([100, 150])],
          ['BBB', closes([50, 25])]
        ])
      )

      strictEqual(chart.title, 'AAA, BBB percent change')
      deepStrictEqual(chart.axes, [{ id: 'y', label: 'Change (%)' }])
      deepStrictEqual(chart.rows, [
        { timestamp: day('2020-01-01'), values: [0, 0] },
        { timestamp: day('2020-01-02'), values: [50, -50] }
      ])
    })
  })

  describe('buildGainLossChart', () => {
    it('should plot gain and loss areas', () => {
      const chart = buildGainLossChart('XYZ', closes([100, 90, 80, 120]), 100)

      strictEqual(chart.title, 'XYZ gain/loss vs 100')
      deepStrictEqual(chart.columns, [
        { name: 'gain', axis: 'y', style: 'area', color: 'green' },
        { name: 'loss', axis: 'y', style: 'area', color: 'red' }
      ])
      deepStrictEqual(chart.rows.map((row) => row.values), [
        [100, null],
        [90, 90],
        [null, 80],
        [120, 120]
      ])
    })

    it('should name the default break-even in the title', () => {
      strictEqual(buildGainLossChart('XYZ', closes([42, 40])).title, 'XYZ gain/loss vs 42')
    })
  })

  describe('buildCandlestickChart', () => {
    it('should emit one row per candle', () => {
      const series: Observation[] = [
        { timestamp: day('2020-01-01'), close: 100 },
        { timestamp: day('2020-01-02'), close: 110 },
        { timestamp: day('2020-02-01'), close: 90 }
      ]
      const chart = buildCandlestickChart('XYZ', series)

      strictEqual(chart.title, 'XYZ monthly candles')
      deepStrictEqual(chart.columns.map((column) => column.name), ['open', 'high', 'low', 'close'])
      deepStrictEqual(chart.rows, [
        { timestamp: Date.UTC(2020, 0, 1), values: [100, 110, 100, 110] },
        { timestamp: Date.UTC(2020, 1, 1), values: [90, 90, 90, 90] }
      ])
    })
  })
})
