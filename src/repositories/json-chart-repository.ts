import type { ChartData } from '../charts'
import { formatDate } from '../models'
import type { ChartRepositoryConfig } from './chart-repository.interface'
import { FileChartRepository } from './file-chart-repository'

/**
 * Writes charts as pretty-printed JSON
 * Each row also carries its calendar date so the file reads without conversion
 */
export class JsonChartRepository extends FileChartRepository {
  constructor(config: ChartRepositoryConfig) {
    super(config)
  }

  protected get extension(): string {
    return 'json'
  }

  protected serialize(chart: ChartData): string {
    const document = {
      ...chart,
      rows: chart.rows.map((row) => ({
        date: formatDate(row.timestamp),
        timestamp: row.timestamp,
        values: row.values
      }))
    }
    return JSON.stringify(document, null, 2) + '\n'
  }
}
