export * from './aggregator'
export * from './bucketing'
export * from './candle-builder'
export * from './gain-loss-partitioner'
export * from './normalizers/percent-change-normalizer'
export * from './transform-errors'
