import type { Observation } from '../models'
import { InvalidBucketFunctionError } from './transform-errors'

/**
 * Name of a calendar period, e.g. '2020', '2020-Q1', '2020-01' or '2020-01-06'
 */
export type BucketKey = string

/**
 * Maps an observation to the bucket it belongs to
 */
export type BucketFunction = (observation: Observation) => BucketKey

export const GRANULARITIES = ['day', 'week', 'month', 'quarter', 'year'] as const

/**
 * Calendar granularities with a built-in bucket function
 */
export type Granularity = (typeof GRANULARITIES)[number]

const DAY_MILLIS = 24 * 60 * 60 * 1000

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

function utcTime(year: number, monthIndex: number, day: number): number {
  const date = new Date(0)
  date.setUTCFullYear(year, monthIndex, day)
  return date.getTime()
}

function dayKey(timestamp: number): BucketKey {
  const date = new Date(timestamp)
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
}

export const byDay: BucketFunction = (observation) => dayKey(observation.timestamp)

/**
 * ISO weeks, keyed by the Monday that starts them
 */
export const byWeek: BucketFunction = (observation) => {
  const date = new Date(observation.timestamp)
  const daysSinceMonday = (date.getUTCDay() + 6) % 7
  return dayKey(observation.timestamp - daysSinceMonday * DAY_MILLIS)
}

export const byMonth: BucketFunction = (observation) => {
  const date = new Date(observation.timestamp)
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}`
}

export const byQuarter: BucketFunction = (observation) => {
  const date = new Date(observation.timestamp)
  return `${pad(date.getUTCFullYear(), 4)}-Q${Math.floor(date.getUTCMonth() / 3) + 1}`
}

export const byYear: BucketFunction = (observation) =>
  pad(new Date(observation.timestamp).getUTCFullYear(), 4)

const BUCKET_FUNCTIONS: Record<Granularity, BucketFunction> = {
  day: byDay,
  week: byWeek,
  month: byMonth,
  quarter: byQuarter,
  year: byYear
}

export function bucketFunctionFor(granularity: Granularity): BucketFunction {
  return BUCKET_FUNCTIONS[granularity]
}

/**
 * Maps a bucket key to the first instant (UTC midnight) of its period
 * @throws InvalidBucketFunctionError if the key does not name a calendar period
 */
export function bucketStart(key: unknown): number {
  if (typeof key !== 'string') {
    throw new InvalidBucketFunctionError(key)
  }

  let match = /^(\d{4})$/.exec(key)
  if (match) {
    return utcTime(Number(match[1]), 0, 1)
  }

  match = /^(\d{4})-Q([1-4])$/.exec(key)
  if (match) {
    return utcTime(Number(match[1]), (Number(match[2]) - 1) * 3, 1)
  }

  match = /^(\d{4})-(\d{2})$/.exec(key)
  if (match) {
    const month = Number(match[2])
    if (month >= 1 && month <= 12) {
      return utcTime(Number(match[1]), month - 1, 1)
    }
    throw new InvalidBucketFunctionError(key)
  }

  match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key)
  if (match) {
    const month = Number(match[2])
    const day = Number(match[3])
    const time = utcTime(Number(match[1]), month - 1, day)
    // Rejects rollovers such as 2021-02-30
    const date = new Date(time)
    if (date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
      return time
    }
  }

  throw new InvalidBucketFunctionError(key)
}
