import type { ChartData } from '../charts'
import { formatDate } from '../models'
import { formatCsvField } from '../utils/csv'
import type { ChartRepositoryConfig } from './chart-repository.interface'
import { FileChartRepository } from './file-chart-repository'

/** Written in place of a missing value */
export const CSV_MISSING_VALUE = 'NA'

/**
 * Writes charts as CSV tables
 * Header is `date` followed by the column names; missing values are written as NA
 */
export class CsvChartRepository extends FileChartRepository {
  private readonly csvDelimiter = ','

  constructor(config: ChartRepositoryConfig) {
    super(config)
  }

  protected get extension(): string {
    return 'csv'
  }

  protected serialize(chart: ChartData): string {
    const header = ['date', ...chart.columns.map((column) => column.name)]
    const lines = [header.map((field) => formatCsvField(field, this.csvDelimiter)).join(this.csvDelimiter)]

    for (const row of chart.rows) {
      const cells = row.values.map((value) => (value === null ? CSV_MISSING_VALUE : String(value)))
      lines.push([formatDate(row.timestamp), ...cells].join(this.csvDelimiter))
    }

    return lines.join('\n') + '\n'
  }
}
