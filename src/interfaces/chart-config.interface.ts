import { z } from 'zod'
import { parseIsoDate } from '../models/observation'
import { GRANULARITIES } from '../transforms/bucketing'

const columnName = z.string().min(1)
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => parseIsoDate(value) !== undefined, 'Expected an existing calendar date')
const granularity = z.enum(GRANULARITIES)

/**
 * Maps the source file's column names onto observation fields
 * Unmapped fields keep their default names: date, open, high, low, close, volume
 */
export const columnMappingSchema = z.object({
  timestamp: columnName.optional(),
  open: columnName.optional(),
  high: columnName.optional(),
  low: columnName.optional(),
  close: columnName.optional(),
  volume: columnName.optional()
})

/**
 * Input section
 * @property {string} path - File path; `{ticker}` is replaced by each ticker
 *
 * @example
 * { type: "csv", path: "./data/{ticker}.csv", columnMapping: { timestamp: "Date", close: "Adj Close" } }
 */
export const inputConfigSchema = z.object({
  type: z.enum(['csv', 'jsonl']),
  path: z.string().min(1),
  delimiter: z.string().length(1).optional(),
  columnMapping: columnMappingSchema.optional()
})

export const chartRequestSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('line') }),
  z.object({ type: z.literal('priceVolume'), granularity: granularity.default('month') }),
  z.object({ type: z.literal('multiSeries') }),
  z.object({ type: z.literal('percentChange'), baselineIndex: z.number().int().nonnegative().default(0) }),
  z.object({ type: z.literal('gainLoss'), breakeven: z.number().positive().optional() }),
  z.object({
    type: z.literal('candlestick'),
    granularity: granularity.default('month'),
    source: z.enum(['close', 'ohlc']).default('close')
  })
])

export const outputConfigSchema = z.object({
  path: z.string().min(1),
  format: z.enum(['json', 'csv']).default('json')
})

/**
 * Main schema for a chart run
 *
 * @example
 * {
 *   input: { type: "csv", path: "./data/{ticker}.csv" },
 *   tickers: ["AAPL", "MSFT"],
 *   range: { start: "2020-01-01", end: "2020-12-31" },
 *   charts: [{ type: "line" }, { type: "candlestick", granularity: "month" }],
 *   output: { path: "./charts", format: "json" }
 * }
 */
export const chartsConfigSchema = z
  .object({
    input: inputConfigSchema,
    tickers: z.array(z.string().regex(/^[A-Za-z0-9.^=_-]{1,20}$/)).min(1),
    range: z.object({ start: isoDate.optional(), end: isoDate.optional() }).optional(),
    charts: z.array(chartRequestSchema).min(1),
    output: outputConfigSchema
  })
  .refine(
    (config) => new Set(config.tickers).size === config.tickers.length,
    { message: 'Tickers must be unique', path: ['tickers'] }
  )
  .refine(
    (config) => !config.range?.start || !config.range.end || config.range.start <= config.range.end,
    { message: 'Range start must not be after range end', path: ['range'] }
  )

export type ColumnMappingConfig = z.infer<typeof columnMappingSchema>
export type InputConfig = z.infer<typeof inputConfigSchema>
export type ChartRequest = z.infer<typeof chartRequestSchema>
export type OutputConfig = z.infer<typeof outputConfigSchema>
export type ChartsConfig = z.infer<typeof chartsConfigSchema>

