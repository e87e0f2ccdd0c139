import { SeriesValidationError } from '../interfaces/data-source.interface'
import { parseCsvLine } from '../utils/csv'
import logger from '../utils/logger'
import type { FileDataSourceConfig, RawRecord } from './file-data-source.base'
import { FileDataSource } from './file-data-source.base'

/**
 * CSV data source
 * Reads a header row followed by one observation per line
 */
export class CsvDataSource extends FileDataSource {
  readonly name = 'csv'
  private readonly delimiter: string

  constructor(config: FileDataSourceConfig) {
    super(config)
    this.delimiter = config.delimiter ?? ','
  }

  protected parseRecords(content: string, filePath: string): RawRecord[] {
    const lines = content.split(/\r?\n/)
    const headerIndex = lines.findIndex((line) => line.trim() !== '')
    const headerLine = lines[headerIndex]
    if (headerLine === undefined) {
      throw new SeriesValidationError(`No header row in ${filePath}`, filePath)
    }

    const headers = parseCsvLine(headerLine, this.delimiter)
    logger.debug('CSV headers parsed', { headers, path: filePath })

    const records: RawRecord[] = []
    for (let i = headerIndex + 1; i < lines.length; i++) {
      const line = lines[i]
      if (line === undefined || line.trim() === '') {
        continue
      }

      const values = parseCsvLine(line, this.delimiter)
      if (values.length !== headers.length) {
        logger.warn('Skipping malformed row', {
          path: filePath,
          line: i + 1,
          expected: headers.length,
          actual: values.length
        })
        continue
      }

      const record: Record<string, string> = {}
      headers.forEach((header, column) => {
        record[header] = values[column] ?? ''
      })
      records.push({ line: i + 1, values: record })
    }

    return records
  }
}
