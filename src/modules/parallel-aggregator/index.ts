export { ParallelAggregator, createParallelAggregator } from './parallel-aggregator.js'
export type { BatchOptions, BatchResult, PhaseRunOutcome, SucceededFlag } from './parallel-aggregator.js'
