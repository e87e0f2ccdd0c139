export * from './csv-data-source'
export * from './data-source.factory'
export * from './file-data-source.base'
export * from './jsonl-data-source'
export * from './memory-data-source'
export * from './series-checks'
