import type { BucketValue, Observation, Series } from '../models'
import type { BucketFunction, BucketKey } from './bucketing'
import { bucketStart } from './bucketing'
import { EmptyInputError } from './transform-errors'

/**
 * Reduces every observation of one bucket to a single value
 */
export type BucketReducer<R> = (bucket: readonly Observation[]) => R

/**
 * Observations already grouped under a bucket key
 */
export interface Bucket {
  readonly key: BucketKey
  readonly observations: readonly Observation[]
}

/**
 * Groups a series into buckets, in the order each key first appears.
 * Observations keep their original relative order inside a bucket.
 * @throws EmptyInputError if the series is empty
 */
export function groupByBucket(series: Series, bucketFn: BucketFunction): Bucket[] {
  if (series.length === 0) {
    throw new EmptyInputError('groupByBucket')
  }

  const groups = new Map<BucketKey, Observation[]>()
  for (const observation of series) {
    const key = bucketFn(observation)
    const group = groups.get(key)
    if (group) {
      group.push(observation)
    } else {
      groups.set(key, [observation])
    }
  }

  return Array.from(groups, ([key, observations]) => ({ key, observations }))
}

/**
 * Reduces pre-grouped buckets, stamping each result with the start of its period
 * @throws InvalidBucketFunctionError if a key cannot be mapped to a period start
 */
export function reduceBuckets<R>(
  buckets: readonly Bucket[],
  reduceFn: BucketReducer<R>
): BucketValue<R>[] {
  // All keys are mapped before any reducer runs
  const stamped = buckets.map((bucket) => ({ bucket, timestamp: bucketStart(bucket.key) }))
  return stamped.map(({ bucket, timestamp }) => ({
    timestamp,
    value: reduceFn(bucket.observations)
  }))
}

/**
 * Groups a series into calendar buckets and reduces each bucket
 *
 * @example
 * ```typescript
 * const monthlyVolume = aggregate(series, byMonth, sumVolume)
 * // [{ timestamp: Date.UTC(2020, 0, 1), value: 51200 }, ...]
 * ```
 *
 * @throws EmptyInputError if the series is empty
 * @throws InvalidBucketFunctionError if bucketFn returns a key that is not a calendar period
 */
export function aggregate<R>(
  series: Series,
  bucketFn: BucketFunction,
  reduceFn: BucketReducer<R>
): BucketValue<R>[] {
  if (series.length === 0) {
    throw new EmptyInputError('aggregate')
  }
  return reduceBuckets(groupByBucket(series, bucketFn), reduceFn)
}

/**
 * Sum of volume; observations without volume count as 0
 */
export const sumVolume: BucketReducer<number> = (bucket) =>
  bucket.reduce((total, observation) => total + (observation.volume ?? 0), 0)

export const lastClose: BucketReducer<number> = (bucket) =>
  bucket.at(-1)?.close ?? NaN

export const meanClose: BucketReducer<number> = (bucket) =>
  bucket.reduce((total, observation) => total + observation.close, 0) / bucket.length
