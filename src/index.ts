// Main exports for the chart series library
export * from './charts'
export * from './interfaces'
export * from './models'
export * from './pipeline'
export * from './providers'
export * from './repositories'
export * from './transforms'
