export * from './derived'
export * from './observation'
