import { ok, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import {
  GRANULARITIES,
  InvalidBucketFunctionError,
  bucketFunctionFor,
  bucketStart,
  byDay,
  byMonth,
  byQuarter,
  byWeek,
  byYear
} from '../../../src/transforms'
import { day, randomWalk } from '../../helpers/series-fixtures'

describe('Bucket functions', () => {
  const at = (date: string) => ({ timestamp: day(date), close: 1 })

  it('should key days, months, quarters and years', () => {
    strictEqual(byDay(at('2020-01-15')), '2020-01-15')
    strictEqual(byMonth(at('2020-01-15')), '2020-01')
    strictEqual(byQuarter(at('2020-05-01')), '2020-Q2')
    strictEqual(byQuarter(at('2020-12-31')), '2020-Q4')
    strictEqual(byYear(at('2020-05-01')), '2020')
  })

  it('should key weeks by their Monday', () => {
    strictEqual(byWeek(at('2020-01-13')), '2020-01-13')
    strictEqual(byWeek(at('2020-01-15')), '2020-01-13')
    strictEqual(byWeek(at('2020-01-19')), '2020-01-13')
    strictEqual(byWeek(at('2020-01-20')), '2020-01-20')
  })

  it('should let weeks cross year boundaries', () => {
    strictEqual(byWeek(at('2021-01-01')), '2020-12-28')
  })

  it('should look up built-in functions by granularity', () => {
    strictEqual(bucketFunctionFor('day'), byDay)
    strictEqual(bucketFunctionFor('week'), byWeek)
    strictEqual(bucketFunctionFor('year'), byYear)
  })
})

describe('bucketStart', () => {
  it('should map every key shape to UTC midnight', () => {
    strictEqual(bucketStart('2020'), Date.UTC(2020, 0, 1))
    strictEqual(bucketStart('2020-Q3'), Date.UTC(2020, 6, 1))
    strictEqual(bucketStart('2020-02'), Date.UTC(2020, 1, 1))
    strictEqual(bucketStart('2020-02-29'), Date.UTC(2020, 1, 29))
  })

  it('should reject keys that are not calendar periods', () => {
    for (const key of ['Jan 2020', '2020-13', '2021-02-29', '2020-Q5', '', 42, undefined]) {
      throws(() => bucketStart(key), InvalidBucketFunctionError)
    }
  })

  it('should place every observation at or after its bucket start', () => {
    const series = randomWalk(60)
    for (const granularity of GRANULARITIES) {
      const bucketFn = bucketFunctionFor(granularity)
      for (const observation of series) {
        ok(bucketStart(bucketFn(observation)) <= observation.timestamp, `${granularity} ${observation.timestamp}`)
      }
    }
  })
})
