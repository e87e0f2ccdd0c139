export * from './chart-config.interface'
export * from './data-source.interface'
