import type { Series } from '../models'

/**
 * Inclusive date range filter in Unix milliseconds (UTC)
 */
export interface DateRange {
  start?: number
  end?: number
}

/**
 * Interface that all data sources must implement
 * Supplies the daily series for a ticker; fetching, authentication and
 * rate limiting are the source's own concern
 */
export interface DataSource {
  /** Unique name identifier for the source */
  readonly name: string

  /**
   * Loads the series for a ticker
   * @returns Observations in strictly increasing timestamp order, close always set
   * @throws SeriesValidationError if the underlying data cannot form a valid series
   */
  getSeries(ticker: string, range?: DateRange): Promise<Series>
}

/**
 * Error thrown when source data cannot form a valid series
 */
export class SeriesValidationError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number
  ) {
    super(message)
    this.name = 'SeriesValidationError'
  }
}
