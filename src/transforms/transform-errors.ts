/**
 * Stable codes for series transformation failures
 */
export type SeriesTransformErrorCode =
  | 'EMPTY_INPUT'
  | 'INDEX_OUT_OF_RANGE'
  | 'DIVISION_BY_ZERO'
  | 'INVALID_BUCKET_FUNCTION'
  | 'EMPTY_BUCKET'

/**
 * Base class for validation failures raised by the series transforms
 */
export abstract class SeriesTransformError extends Error {
  protected constructor(
    message: string,
    public readonly code: SeriesTransformErrorCode
  ) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Thrown when a transform receives a series with no observations
 */
export class EmptyInputError extends SeriesTransformError {
  constructor(operation: string) {
    super(`${operation} requires a non-empty series`, 'EMPTY_INPUT')
  }
}

/**
 * Thrown when an index does not address an element of the series
 */
export class IndexOutOfRangeError extends SeriesTransformError {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(`Index ${index} is out of range for a series of length ${length}`, 'INDEX_OUT_OF_RANGE')
  }
}

/**
 * Thrown when a ratio would divide by a zero baseline
 */
export class DivisionByZeroError extends SeriesTransformError {
  constructor(public readonly baselineIndex: number) {
    super(`Baseline close at index ${baselineIndex} is 0`, 'DIVISION_BY_ZERO')
  }
}

/**
 * Thrown when a bucket key cannot be mapped to the start of a calendar period
 */
export class InvalidBucketFunctionError extends SeriesTransformError {
  constructor(public readonly key: unknown) {
    super(
      `Bucket key ${JSON.stringify(key)} does not name a calendar period (expected YYYY, YYYY-Qn, YYYY-MM or YYYY-MM-DD)`,
      'INVALID_BUCKET_FUNCTION'
    )
  }
}

/**
 * Thrown when a bucket holds no observations
 */
export class EmptyBucketError extends SeriesTransformError {
  constructor(public readonly key?: string) {
    super(
      key === undefined ? 'A bucket contains no observations' : `Bucket '${key}' contains no observations`,
      'EMPTY_BUCKET'
    )
  }
}
