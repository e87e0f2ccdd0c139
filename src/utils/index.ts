export * from './csv'
export { default as logger, setLogLevel } from './logger'
