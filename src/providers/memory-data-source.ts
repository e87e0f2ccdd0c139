import type { DataSource, DateRange } from '../interfaces/data-source.interface'
import { SeriesValidationError } from '../interfaces/data-source.interface'
import type { Series } from '../models'
import { isValidObservation } from '../models'
import { assertStrictlyIncreasing, filterRange } from './series-checks'

/**
 * Serves series registered in memory
 */
export class MemoryDataSource implements DataSource {
  readonly name = 'memory'
  private readonly series = new Map<string, Series>()

  constructor(initial: Record<string, Series> = {}) {
    for (const [ticker, series] of Object.entries(initial)) {
      this.add(ticker, series)
    }
  }

  /**
   * Registers a series, replacing any previous one for the ticker
   * @throws SeriesValidationError if an observation is invalid or timestamps do not strictly increase
   */
  add(ticker: string, series: Series): this {
    const source = `memory:${ticker}`
    const invalid = series.findIndex((observation) => !isValidObservation(observation))
    if (invalid !== -1) {
      throw new SeriesValidationError(`Invalid observation at index ${invalid} in ${source}`, source)
    }
    assertStrictlyIncreasing(series, source)
    this.series.set(ticker, [...series])
    return this
  }

  async getSeries(ticker: string, range?: DateRange): Promise<Series> {
    const series = this.series.get(ticker)
    if (!series) {
      throw new SeriesValidationError(`No series registered for ticker '${ticker}'`, 'memory')
    }
    return filterRange(series, range)
  }
}
