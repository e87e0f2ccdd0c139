import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import type { ChartData } from '../charts'
import logger from '../utils/logger'
import type { ChartRepository, ChartRepositoryConfig } from './chart-repository.interface'
import { RepositoryStorageError } from './chart-repository.interface'

const SAFE_NAME = /^[A-Za-z0-9._^=-]+$/

/**
 * Abstract base class for file-based chart repositories (JSON, CSV)
 * Writes one file per chart into a single directory
 */
export abstract class FileChartRepository implements ChartRepository {
  protected readonly directory: string

  protected constructor(config: ChartRepositoryConfig) {
    this.directory = path.resolve(config.directory)
  }

  /**
   * File extension without the dot
   */
  protected abstract get extension(): string

  /**
   * Serialize a chart to file content
   */
  protected abstract serialize(chart: ChartData): string

  async save(name: string, chart: ChartData): Promise<string> {
    if (!SAFE_NAME.test(name)) {
      throw new RepositoryStorageError(`Invalid chart name: '${name}'`)
    }

    const filePath = path.join(this.directory, `${name}.${this.extension}`)
    try {
      await mkdir(this.directory, { recursive: true })
      await writeFile(filePath, this.serialize(chart), 'utf8')
    } catch (error) {
      logger.error('Failed to write chart', { error, path: filePath })
      throw new RepositoryStorageError(
        `Failed to write chart ${filePath}: ${String(error)}`,
        error instanceof Error ? error : undefined
      )
    }

    logger.debug('Chart written', { kind: chart.kind, rows: chart.rows.length, path: filePath })
    return filePath
  }
}
