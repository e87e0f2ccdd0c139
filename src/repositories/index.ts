export * from './chart-repository.factory'
export * from './chart-repository.interface'
export * from './csv-chart-repository'
export * from './file-chart-repository'
export * from './json-chart-repository'
