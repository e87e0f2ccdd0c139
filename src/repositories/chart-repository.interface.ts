import type { ChartData } from '../charts'

/**
 * Configuration options for chart repositories
 */
export interface ChartRepositoryConfig {
  /** Directory the charts are written to; created if missing */
  directory: string
}

/**
 * Interface for chart storage
 * Hands chart data over to whatever renders it
 */
export interface ChartRepository {
  /**
   * Save one chart under a name
   * @param name File-safe chart name, without extension
   * @returns Path of the written file
   * @throws RepositoryStorageError if the chart cannot be written
   */
  save(name: string, chart: ChartData): Promise<string>
}

/**
 * Base error class for repository operations
 */
export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'RepositoryError'
  }
}

/**
 * Storage error when there are issues with the underlying storage
 */
export class RepositoryStorageError extends RepositoryError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_ERROR', cause)
    this.name = 'RepositoryStorageError'
  }
}
