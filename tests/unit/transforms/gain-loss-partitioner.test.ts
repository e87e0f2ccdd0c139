import { deepStrictEqual, ok, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import type { GainLossSeries } from '../../../src/models'
import { EmptyInputError, partitionGainLoss } from '../../../src/transforms'
import { closes, randomWalk } from '../../helpers/series-fixtures'

const values = ({ gain, loss }: GainLossSeries) => ({
  gain: gain.map((point) => point.value),
  loss: loss.map((point) => point.value)
})

describe('partitionGainLoss', () => {
  it('should stitch both series where the price crosses break-even', () => {
    deepStrictEqual(values(partitionGainLoss(closes([100, 90, 80, 120]), 100)), {
      gain: [100, 90, null, 120],
      loss: [null, 90, 80, 120]
    })
  })

  it('should default break-even to the first close', () => {
    deepStrictEqual(values(partitionGainLoss(closes([100, 90, 80, 120]))), {
      gain: [100, 90, null, 120],
      loss: [null, 90, 80, 120]
    })
  })

  it('should count a close equal to break-even as a gain', () => {
    deepStrictEqual(values(partitionGainLoss(closes([100, 100]), 100)), {
      gain: [100, 100],
      loss: [null, null]
    })
  })

  it('should leave one side empty when the series never crosses', () => {
    deepStrictEqual(values(partitionGainLoss(closes([100, 101, 102]))), {
      gain: [100, 101, 102],
      loss: [null, null, null]
    })
    deepStrictEqual(values(partitionGainLoss(closes([100, 90]), 200)), {
      gain: [null, null],
      loss: [100, 90]
    })
  })

  it('should never stitch the first index', () => {
    deepStrictEqual(values(partitionGainLoss(closes([90, 110]), 100)), {
      gain: [null, 110],
      loss: [90, 110]
    })
  })

  it('should read look-behind after it was stitched', () => {
    deepStrictEqual(values(partitionGainLoss(closes([90, 110, 80]), 100)), {
      gain: [null, 110, null],
      loss: [90, 110, 80]
    })
  })

  it('should keep the timestamps of the input', () => {
    const series = closes([5, 6])
    const { gain, loss } = partitionGainLoss(series, 5.5)
    deepStrictEqual(gain.map((point) => point.timestamp), series.map((observation) => observation.timestamp))
    deepStrictEqual(loss.map((point) => point.timestamp), series.map((observation) => observation.timestamp))
  })

  it('should cover every index and join regions at each crossing', () => {
    const series = randomWalk(200)
    const breakeven = 100
    const { gain, loss } = partitionGainLoss(series, breakeven)

    series.forEach((observation, i) => {
      const g = gain[i]?.value ?? null
      const l = loss[i]?.value ?? null
      ok(g !== null || l !== null, `index ${i} has no value`)
      for (const value of [g, l]) {
        ok(value === null || value === observation.close)
      }

      const previous = series[i - 1]
      const previousStitched = gain[i - 1]?.value != null && loss[i - 1]?.value != null
      if (previous && !previousStitched && (previous.close >= breakeven) !== (observation.close >= breakeven)) {
        strictEqual(g, observation.close, `gain at crossing ${i}`)
        strictEqual(l, observation.close, `loss at crossing ${i}`)
      }
    })
  })

  it('should throw on an empty series', () => {
    throws(() => partitionGainLoss([]), EmptyInputError)
  })
})
