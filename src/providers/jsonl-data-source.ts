import { SeriesValidationError } from '../interfaces/data-source.interface'
import type { FileDataSourceConfig, RawRecord } from './file-data-source.base'
import { FileDataSource } from './file-data-source.base'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Jsonl data source
 * Reads one JSON object per line
 */
export class JsonlDataSource extends FileDataSource {
  readonly name = 'jsonl'

  constructor(config: FileDataSourceConfig) {
    super(config)
  }

  protected parseRecords(content: string, filePath: string): RawRecord[] {
    const records: RawRecord[] = []

    content.split(/\r?\n/).forEach((line, index) => {
      if (line.trim() === '') {
        return
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch (error) {
        throw new SeriesValidationError(
          `Invalid JSON at line ${index + 1} of ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          filePath,
          index + 1
        )
      }

      if (!isRecord(parsed)) {
        throw new SeriesValidationError(
          `Expected a JSON object at line ${index + 1} of ${filePath}`,
          filePath,
          index + 1
        )
      }

      records.push({ line: index + 1, values: parsed })
    })

    return records
  }
}
