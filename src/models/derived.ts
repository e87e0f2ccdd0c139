/**
 * A reduced value for one calendar bucket
 * timestamp is the first instant of the bucket period
 */
export interface BucketValue<R> {
  readonly timestamp: number
  readonly value: R
}

/**
 * A point that may be missing; null is the missing-value marker
 */
export interface SparsePoint {
  readonly timestamp: number
  readonly value: number | null
}

/**
 * Gain and loss sub-series of the same length as their source
 */
export interface GainLossSeries {
  readonly gain: readonly SparsePoint[]
  readonly loss: readonly SparsePoint[]
}

/**
 * Open/high/low/close summary of one bucket
 */
export interface Candle {
  readonly timestamp: number
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number
  /** Summed volume, present when any observation in the bucket had one */
  readonly volume?: number
}
