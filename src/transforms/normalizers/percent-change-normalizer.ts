import type { Observation, ObservationDraft, Series } from '../../models'
import { DivisionByZeroError, EmptyInputError, IndexOutOfRangeError } from '../transform-errors'

/**
 * Percent Change Normalizer
 *
 * Rebases a price series to its percent change from a baseline observation,
 * so series with different price levels can share one axis.
 *
 * **Formula**: (Pt / Pbase - 1) * 100
 *
 * Open, high and low are rebased against the same baseline close when present;
 * volume is carried over unchanged. The result is a new series and the input is
 * left untouched.
 *
 * @example
 * ```typescript
 * percentChange(series)      // relative to the first observation
 * percentChange(series, 20)  // relative to the 21st observation
 * ```
 *
 * @note The baseline observation always maps to 0. Re-normalizing an already
 * normalized series against that baseline therefore divides by zero.
 *
 * @throws EmptyInputError if the series is empty
 * @throws IndexOutOfRangeError if baselineIndex is not an integer index into the series
 * @throws DivisionByZeroError if the baseline close is 0
 */
export function percentChange(series: Series, baselineIndex = 0): Observation[] {
  if (series.length === 0) {
    throw new EmptyInputError('percentChange')
  }

  const baseline = Number.isInteger(baselineIndex) ? series[baselineIndex] : undefined
  if (baseline === undefined) {
    throw new IndexOutOfRangeError(baselineIndex, series.length)
  }

  const base = baseline.close
  if (base === 0) {
    throw new DivisionByZeroError(baselineIndex)
  }

  const rebase = (price: number): number => (price / base - 1) * 100

  return series.map((observation) => {
    const rebased: ObservationDraft = {
      timestamp: observation.timestamp,
      close: rebase(observation.close)
    }
    if (observation.open !== undefined) rebased.open = rebase(observation.open)
    if (observation.high !== undefined) rebased.high = rebase(observation.high)
    if (observation.low !== undefined) rebased.low = rebase(observation.low)
    if (observation.volume !== undefined) rebased.volume = observation.volume
    return rebased
  })
}
