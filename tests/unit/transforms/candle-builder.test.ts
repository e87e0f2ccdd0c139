import { deepStrictEqual, ok, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import type { Observation } from '../../../src/models'
import {
  EmptyBucketError,
  EmptyInputError,
  buildCandles,
  buildCandlesFromBuckets,
  byMonth,
  byWeek,
  candleReducer
} from '../../../src/transforms'
import { day, randomWalk } from '../../helpers/series-fixtures'

describe('buildCandles', () => {
  it('should build monthly candles from closes', () => {
    const series: Observation[] = [
      { timestamp: day('2020-01-01'), close: 100 },
      { timestamp: day('2020-01-02'), close: 110 },
      { timestamp: day('2020-02-01'), close: 90 }
    ]

    deepStrictEqual(buildCandles(series, byMonth), [
      { timestamp: Date.UTC(2020, 0, 1), open: 100, high: 110, low: 100, close: 110 },
      { timestamp: Date.UTC(2020, 1, 1), open: 90, high: 90, low: 90, close: 90 }
    ])
  })

  it('should sum volume when observations carry it', () => {
    const series: Observation[] = [
      { timestamp: day('2020-01-02'), close: 10, volume: 300 },
      { timestamp: day('2020-01-03'), close: 12 },
      { timestamp: day('2020-01-06'), close: 11, volume: 200 }
    ]

    deepStrictEqual(buildCandles(series, byMonth), [
      { timestamp: Date.UTC(2020, 0, 1), open: 10, high: 12, low: 10, close: 11, volume: 500 }
    ])
  })

  it('should use open, high and low fields with the ohlc source', () => {
    const series: Observation[] = [
      { timestamp: day('2020-01-02'), open: 100, high: 105, low: 95, close: 102 },
      { timestamp: day('2020-01-03'), open: 102, high: 108, low: 101, close: 107 },
      { timestamp: day('2020-01-06'), close: 104 }
    ]

    deepStrictEqual(buildCandles(series, byMonth, { source: 'ohlc' }), [
      { timestamp: Date.UTC(2020, 0, 1), open: 100, high: 108, low: 95, close: 104 }
    ])
    deepStrictEqual(buildCandles(series, byMonth), [
      { timestamp: Date.UTC(2020, 0, 1), open: 102, high: 107, low: 102, close: 104 }
    ])
  })

  it('should widen the ohlc range to an open without high or low', () => {
    const series: Observation[] = [{ timestamp: day('2020-01-02'), open: 20, close: 10 }]
    deepStrictEqual(buildCandles(series, byMonth, { source: 'ohlc' }), [
      { timestamp: Date.UTC(2020, 0, 1), open: 20, high: 20, low: 10, close: 10 }
    ])
  })

  it('should keep open and close within the candle range', () => {
    const candles = buildCandles(randomWalk(120), byWeek)
    for (const candle of candles) {
      ok(candle.low <= Math.min(candle.open, candle.close))
      ok(candle.high >= Math.max(candle.open, candle.close))
    }
  })

  it('should throw on an empty series', () => {
    throws(() => buildCandles([], byMonth), EmptyInputError)
  })
})

describe('buildCandlesFromBuckets', () => {
  it('should build candles from pre-grouped buckets', () => {
    const candles = buildCandlesFromBuckets([
      { key: '2020-Q1', observations: [{ timestamp: day('2020-02-03'), close: 5 }, { timestamp: day('2020-03-02'), close: 7 }] }
    ])
    deepStrictEqual(candles, [{ timestamp: Date.UTC(2020, 0, 1), open: 5, high: 7, low: 5, close: 7 }])
  })

  it('should name the empty bucket', () => {
    throws(
      () => buildCandlesFromBuckets([{ key: '2020-05', observations: [] }]),
      (error: unknown) => error instanceof EmptyBucketError && error.key === '2020-05'
    )
  })

  it('should reject an empty bucket passed to the reducer directly', () => {
    throws(() => candleReducer()([]), EmptyBucketError)
    strictEqual(new EmptyBucketError().message, 'A bucket contains no observations')
  })
})
