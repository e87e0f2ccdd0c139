import type { Candle, Observation, Series } from '../models'
import type { Bucket, BucketReducer } from './aggregator'
import { aggregate, reduceBuckets } from './aggregator'
import type { BucketFunction } from './bucketing'
import { EmptyBucketError } from './transform-errors'

/**
 * Which fields feed the candle
 * - close: open/high/low/close are all taken from close prices
 * - ohlc: open/high/low fields are used where present; a missing high or low
 *   falls back to the observation's open and close
 */
export type CandleSource = 'close' | 'ohlc'

export interface CandleOptions {
  source?: CandleSource
}

type CandleBody = Omit<Candle, 'timestamp'>

/**
 * Builds the reducer that summarizes one bucket into a candle.
 * Observations must be in chronological order for open and close to be meaningful;
 * this is not checked.
 */
export function candleReducer(source: CandleSource = 'close'): BucketReducer<CandleBody> {
  return (bucket: readonly Observation[]): CandleBody => {
    const first = bucket[0]
    const last = bucket[bucket.length - 1]
    if (first === undefined || last === undefined) {
      throw new EmptyBucketError()
    }

    const useOhlc = source === 'ohlc'
    let high = -Infinity
    let low = Infinity
    let volume = 0
    let hasVolume = false

    for (const observation of bucket) {
      const { open = observation.close, close } = observation
      high = Math.max(high, useOhlc ? observation.high ?? Math.max(open, close) : close)
      low = Math.min(low, useOhlc ? observation.low ?? Math.min(open, close) : close)
      if (observation.volume !== undefined) {
        volume += observation.volume
        hasVolume = true
      }
    }

    const open = useOhlc ? first.open ?? first.close : first.close
    const body = { open, high, low, close: last.close }
    return hasVolume ? { ...body, volume } : body
  }
}

/**
 * Builds one OHLC candle per bucket of a chronologically ordered series
 *
 * @example
 * ```typescript
 * const monthly = buildCandles(series, byMonth)
 * ```
 *
 * @throws EmptyInputError if the series is empty
 * @throws InvalidBucketFunctionError if bucketFn returns a key that is not a calendar period
 */
export function buildCandles(
  series: Series,
  bucketFn: BucketFunction,
  options: CandleOptions = {}
): Candle[] {
  return aggregate(series, bucketFn, candleReducer(options.source)).map(
    ({ timestamp, value }) => ({ timestamp, ...value })
  )
}

/**
 * Builds candles from buckets grouped elsewhere
 * @throws EmptyBucketError if any bucket has no observations
 * @throws InvalidBucketFunctionError if a bucket key is not a calendar period
 */
export function buildCandlesFromBuckets(
  buckets: readonly Bucket[],
  options: CandleOptions = {}
): Candle[] {
  const empty = buckets.find((bucket) => bucket.observations.length === 0)
  if (empty) {
    throw new EmptyBucketError(empty.key)
  }

  return reduceBuckets(buckets, candleReducer(options.source)).map(
    ({ timestamp, value }) => ({ timestamp, ...value })
  )
}
