import type { SparsePoint } from '../models'

/**
 * Kinds of chart this toolkit prepares data for
 */
export type ChartKind =
  | 'line'
  | 'priceVolume'
  | 'multiSeries'
  | 'percentChange'
  | 'gainLoss'
  | 'candlestick'

export type AxisId = 'y' | 'y2'

export type ColumnStyle = 'line' | 'area' | 'bar' | 'candlestick'

export interface AxisSpec {
  id: AxisId
  label: string
}

export interface ColumnSpec {
  name: string
  axis: AxisId
  style: ColumnStyle
  color?: string
}

/**
 * One row per timestamp, one value per column, null where a column has no value
 */
export interface ChartRow {
  timestamp: number
  values: (number | null)[]
}

/**
 * Renderer-neutral description of a chart: what to plot, never how
 */
export interface ChartData {
  kind: ChartKind
  title: string
  axes: AxisSpec[]
  columns: ColumnSpec[]
  rows: ChartRow[]
}

/**
 * Outer-joins sparse columns on timestamp
 * Rows come out in ascending timestamp order; a column with no point at a
 * timestamp gets null there
 */
export function alignColumns(columns: readonly (readonly SparsePoint[])[]): ChartRow[] {
  const rows = new Map<number, (number | null)[]>()

  columns.forEach((points, column) => {
    for (const point of points) {
      let values = rows.get(point.timestamp)
      if (!values) {
        values = new Array<number | null>(columns.length).fill(null)
        rows.set(point.timestamp, values)
      }
      values[column] = point.value
    }
  })

  return Array.from(rows, ([timestamp, values]) => ({ timestamp, values })).sort(
    (a, b) => a.timestamp - b.timestamp
  )
}
