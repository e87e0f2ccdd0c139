export * from './chart-pipeline'
