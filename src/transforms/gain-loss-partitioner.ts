import type { GainLossSeries, Series, SparsePoint } from '../models'
import { EmptyInputError } from './transform-errors'

/**
 * Splits a series into gain and loss sub-series around a break-even price.
 *
 * Each close at or above `breakeven` goes to `gain`, each close below it to
 * `loss`; the other side gets `null`. A forward pass then stitches the two
 * together where the series crosses over, so two filled regions drawn from
 * them meet instead of leaving a gap. For every index i from 1:
 * - gain[i] is null and loss[i - 1] is null: gain[i] takes loss[i]
 * - loss[i] is null and gain[i - 1] is null: loss[i] takes gain[i]
 *
 * Look-behind reads index i - 1 after it was itself stitched. Index 0 is
 * never stitched.
 *
 * @example
 * ```typescript
 * partitionGainLoss(closes([100, 90, 80, 120]), 100)
 * // gain: [100, 90, null, 120]
 * // loss: [null, 90, 80, 120]
 * ```
 *
 * @param breakeven Defaults to the first close
 * @throws EmptyInputError if the series is empty
 */
export function partitionGainLoss(series: Series, breakeven?: number): GainLossSeries {
  const first = series[0]
  if (first === undefined) {
    throw new EmptyInputError('partitionGainLoss')
  }
  const threshold = breakeven ?? first.close

  const gain: SparsePoint[] = []
  const loss: SparsePoint[] = []

  let prevGain: number | null = null
  let prevLoss: number | null = null

  for (const [i, { timestamp, close }] of series.entries()) {
    let gainValue: number | null = close >= threshold ? close : null
    let lossValue: number | null = close >= threshold ? null : close

    if (i > 0) {
      if (gainValue === null && prevLoss === null) {
        gainValue = lossValue
      }
      if (lossValue === null && prevGain === null) {
        lossValue = gainValue
      }
    }

    gain.push({ timestamp, value: gainValue })
    loss.push({ timestamp, value: lossValue })
    prevGain = gainValue
    prevLoss = lossValue
  }

  return { gain, loss }
}
