import type { OutputConfig } from '../interfaces/chart-config.interface'
import type { ChartRepository } from './chart-repository.interface'
import { CsvChartRepository } from './csv-chart-repository'
import { JsonChartRepository } from './json-chart-repository'

/**
 * Factory for creating chart repositories based on output format
 */
export function createChartRepository(config: OutputConfig): ChartRepository {
  switch (config.format) {
    case 'json':
      return new JsonChartRepository({ directory: config.path })
    case 'csv':
      return new CsvChartRepository({ directory: config.path })
  }
}
