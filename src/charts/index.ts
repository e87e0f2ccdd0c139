export * from './chart-builders'
export * from './chart-data'
