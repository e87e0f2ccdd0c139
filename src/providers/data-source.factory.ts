import type { InputConfig } from '../interfaces/chart-config.interface'
import type { DataSource } from '../interfaces/data-source.interface'
import { CsvDataSource } from './csv-data-source'
import { JsonlDataSource } from './jsonl-data-source'

/**
 * Factory for creating data sources based on input type
 */
export function createDataSource(config: InputConfig): DataSource {
  switch (config.type) {
    case 'csv':
      return new CsvDataSource(config)
    case 'jsonl':
      return new JsonlDataSource(config)
  }
}
