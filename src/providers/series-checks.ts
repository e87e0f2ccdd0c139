import type { DateRange } from '../interfaces/data-source.interface'
import { SeriesValidationError } from '../interfaces/data-source.interface'
import type { Observation, Series } from '../models'
import { formatDate, parseIsoDate } from '../models'

/**
 * Keeps the observations inside an inclusive date range
 */
export function filterRange<T extends Observation>(observations: readonly T[], range?: DateRange): T[] {
  const start = range?.start ?? -Infinity
  const end = range?.end ?? Infinity
  return observations.filter((observation) => observation.timestamp >= start && observation.timestamp <= end)
}

/**
 * Checks that timestamps strictly increase
 * @throws SeriesValidationError naming the first offending pair
 */
export function assertStrictlyIncreasing(series: Series, source: string): void {
  for (let i = 1; i < series.length; i++) {
    const previous = series[i - 1]
    const current = series[i]
    if (previous && current && current.timestamp <= previous.timestamp) {
      const kind = current.timestamp === previous.timestamp ? 'Duplicate' : 'Out-of-order'
      throw new SeriesValidationError(
        `${kind} timestamp ${formatDate(current.timestamp)} after ${formatDate(previous.timestamp)} in ${source}`,
        source
      )
    }
  }
}

/**
 * Parses a YYYY-MM-DD date as UTC midnight; the end of a range is widened to the end of its day
 */
export function toDateRange(range?: { start?: string; end?: string }): DateRange | undefined {
  if (!range) {
    return undefined
  }
  const dayMillis = 24 * 60 * 60 * 1000
  const start = range.start === undefined ? undefined : parseIsoDate(range.start)
  const end = range.end === undefined ? undefined : parseIsoDate(range.end)
  return {
    start,
    end: end === undefined ? undefined : end + dayMillis - 1
  }
}
