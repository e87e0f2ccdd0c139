import { promises as fsPromises } from 'node:fs'
import * as path from 'node:path'
import { z } from 'zod'
import type { ColumnMappingConfig } from '../interfaces/chart-config.interface'
import type { DataSource, DateRange } from '../interfaces/data-source.interface'
import { SeriesValidationError } from '../interfaces/data-source.interface'
import type { Observation, ObservationDraft, Series } from '../models'
import { isWithinRange, parseIsoDate } from '../models'
import logger from '../utils/logger'
import { assertStrictlyIncreasing, filterRange } from './series-checks'

/**
 * Column name in the file for each observation field
 */
export interface ColumnMapping {
  timestamp: string
  open: string
  high: string
  low: string
  close: string
  volume: string
}

/**
 * Configuration for file-backed data sources
 */
export interface FileDataSourceConfig {
  /** Path to the data file; `{ticker}` is replaced by the requested ticker */
  path: string
  /** Column names in the file, defaulting to date/open/high/low/close/volume */
  columnMapping?: ColumnMappingConfig
  /** CSV-specific: delimiter character */
  delimiter?: string
}

/**
 * One record read from a file, keyed by the file's own column names
 */
export interface RawRecord {
  /** 1-based line number in the file */
  line: number
  values: Record<string, unknown>
}

const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  timestamp: 'date',
  open: 'open',
  high: 'high',
  low: 'low',
  close: 'close',
  volume: 'volume'
}

// Timestamps below 2001-01-01 in milliseconds are read as seconds
const SECONDS_THRESHOLD = 978307200000

const MISSING_MARKERS = new Set(['', 'na', 'nan', 'null'])

const observationSchema = z.object({
  timestamp: z.number({ error: 'missing or not a date' }),
  open: z.number().optional(),
  high: z.number().optional(),
  low: z.number().optional(),
  close: z.number({ error: 'missing or not a number' }),
  volume: z.number().int().nonnegative().optional()
}).refine(isWithinRange, { message: 'open and close must lie within [low, high]' })

/**
 * Abstract base class for file-based data sources
 * Provides common functionality for CSV, Jsonl, and other file formats
 */
export abstract class FileDataSource implements DataSource {
  abstract readonly name: string
  protected readonly pathTemplate: string
  protected readonly columnMapping: ColumnMapping

  protected constructor(config: FileDataSourceConfig) {
    this.pathTemplate = config.path
    const overrides = config.columnMapping ?? {}
    this.columnMapping = {
      timestamp: overrides.timestamp ?? DEFAULT_COLUMN_MAPPING.timestamp,
      open: overrides.open ?? DEFAULT_COLUMN_MAPPING.open,
      high: overrides.high ?? DEFAULT_COLUMN_MAPPING.high,
      low: overrides.low ?? DEFAULT_COLUMN_MAPPING.low,
      close: overrides.close ?? DEFAULT_COLUMN_MAPPING.close,
      volume: overrides.volume ?? DEFAULT_COLUMN_MAPPING.volume
    }
  }

  /**
   * Splits file content into raw records
   * @throws SeriesValidationError if the content cannot be read as this format
   */
  protected abstract parseRecords(content: string, filePath: string): RawRecord[]

  /**
   * Resolves the file that holds a ticker's data
   */
  resolvePath(ticker: string): string {
    return path.resolve(this.pathTemplate.split('{ticker}').join(ticker))
  }

  async getSeries(ticker: string, range?: DateRange): Promise<Series> {
    const filePath = this.resolvePath(ticker)

    let content: string
    try {
      content = await fsPromises.readFile(filePath, 'utf8')
    } catch (error) {
      logger.error('Failed to read data file', { error, path: filePath })
      throw new Error(`Cannot access file: ${filePath}`, { cause: error })
    }

    const observations = this.parseRecords(content, filePath).map((record) =>
      this.toObservation(record, filePath)
    )
    const series = filterRange(observations, range)
    assertStrictlyIncreasing(series, filePath)

    logger.info('Loaded series', {
      source: this.name,
      ticker,
      path: filePath,
      observations: series.length
    })

    return series
  }

  /**
   * Maps a raw record onto an observation and validates it
   * @throws SeriesValidationError naming the line if a field is invalid
   */
  protected toObservation(record: RawRecord, filePath: string): Observation {
    const mapping = this.columnMapping
    const candidate = {
      timestamp: this.parseTimestamp(record.values[mapping.timestamp]),
      open: this.parseNumber(record.values[mapping.open]),
      high: this.parseNumber(record.values[mapping.high]),
      low: this.parseNumber(record.values[mapping.low]),
      close: this.parseNumber(record.values[mapping.close]),
      volume: this.parseNumber(record.values[mapping.volume])
    }

    const parsed = observationSchema.safeParse(candidate)
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
        .join('; ')
      throw new SeriesValidationError(
        `Invalid observation at line ${record.line} of ${filePath}: ${details}`,
        filePath,
        record.line
      )
    }

    const { timestamp, open, high, low, close, volume } = parsed.data
    const observation: ObservationDraft = { timestamp, close }
    if (open !== undefined) observation.open = open
    if (high !== undefined) observation.high = high
    if (low !== undefined) observation.low = low
    if (volume !== undefined) observation.volume = volume
    return observation
  }

  /**
   * Parses epoch seconds, epoch milliseconds or a YYYY-MM-DD date (UTC); undefined otherwise
   */
  protected parseTimestamp(value: unknown): number | undefined {
    if (this.isMissing(value)) {
      return undefined
    }

    const convertIfSeconds = (num: number): number =>
      num > 0 && num < SECONDS_THRESHOLD ? num * 1000 : num

    if (typeof value === 'number') {
      return Number.isFinite(value) ? convertIfSeconds(value) : undefined
    }

    if (typeof value !== 'string') {
      return undefined
    }

    const numericValue = Number(value)
    if (!isNaN(numericValue)) {
      return convertIfSeconds(numericValue)
    }

    // Other date strings would be read in the local time zone
    return parseIsoDate(value.trim())
  }

  /**
   * Parses a numeric value; undefined for missing markers, NaN for garbage
   */
  protected parseNumber(value: unknown): number | undefined {
    if (this.isMissing(value)) {
      return undefined
    }
    if (typeof value === 'number') {
      return value
    }
    if (typeof value === 'string') {
      return Number(value)
    }
    return NaN
  }

  private isMissing(value: unknown): boolean {
    return (
      value === undefined ||
      value === null ||
      (typeof value === 'string' && MISSING_MARKERS.has(value.trim().toLowerCase()))
    )
  }
}
