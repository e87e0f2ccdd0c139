/**
 * A single daily price/volume observation for a ticker
 */
export interface Observation {
  /** Unix timestamp in milliseconds (UTC), day granularity */
  readonly timestamp: number

  /** Opening price, when the source supplies full OHLCV */
  readonly open?: number

  /** Highest price, when the source supplies full OHLCV */
  readonly high?: number

  /** Lowest price, when the source supplies full OHLCV */
  readonly low?: number

  /** Closing price, always present */
  readonly close: number

  /** Shares traded, when the source supplies it */
  readonly volume?: number
}

/**
 * Writable form of an observation, used while one is being assembled
 */
export type ObservationDraft = { -readonly [K in keyof Observation]: Observation[K] }

/**
 * Observations ordered by strictly increasing timestamp
 */
export type Series = readonly Observation[]

/**
 * Creates a close-only observation
 */
export function toObservation(timestamp: number, close: number, volume?: number): Observation {
  return volume === undefined ? { timestamp, close } : { timestamp, close, volume }
}

/**
 * Validates that an observation has usable values
 * @returns true if valid, false otherwise
 */
export function isValidObservation(data: Partial<Observation>): boolean {
  if (typeof data.timestamp !== 'number' || !Number.isFinite(data.timestamp)) {
    return false
  }

  if (typeof data.close !== 'number' || !Number.isFinite(data.close)) {
    return false
  }

  for (const value of [data.open, data.high, data.low]) {
    if (value !== undefined && !Number.isFinite(value)) {
      return false
    }
  }

  if (data.volume !== undefined && (!Number.isInteger(data.volume) || data.volume < 0)) {
    return false
  }

  return isWithinRange(data)
}

/**
 * Checks that open and close lie within [low, high] and that high >= low
 * Bounds that are absent do not constrain
 */
export function isWithinRange(data: Pick<Partial<Observation>, 'open' | 'high' | 'low' | 'close'>): boolean {
  const { high, low } = data
  if (high !== undefined && low !== undefined && high < low) {
    return false
  }

  const prices = [data.open, data.close].filter((price): price is number => price !== undefined)
  return prices.every(
    (price) => (high === undefined || price <= high) && (low === undefined || price >= low)
  )
}

/**
 * Formats an observation as a string for logging
 */
export function formatObservation(data: Observation): string {
  const date = new Date(data.timestamp).toISOString().slice(0, 10)
  const parts = [date]
  if (data.open !== undefined) parts.push(`O:${data.open}`)
  if (data.high !== undefined) parts.push(`H:${data.high}`)
  if (data.low !== undefined) parts.push(`L:${data.low}`)
  parts.push(`C:${data.close}`)
  if (data.volume !== undefined) parts.push(`V:${data.volume}`)
  return parts.join(' ')
}

/**
 * Formats a timestamp as a YYYY-MM-DD calendar date (UTC)
 */
export function formatDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10)
}

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})(T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?Z)?$/

/**
 * Parses a YYYY-MM-DD date, optionally with a UTC time such as T12:00:00Z
 * @returns Unix milliseconds, or undefined for any other format and for
 * dates that do not exist, such as 2021-02-30
 */
export function parseIsoDate(value: string): number | undefined {
  const match = ISO_DATE.exec(value)
  if (!match) {
    return undefined
  }

  const time = Date.parse(value)
  if (isNaN(time) || formatDate(time) !== match[1]) {
    return undefined
  }
  return time
}
