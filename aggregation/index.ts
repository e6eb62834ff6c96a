export { AggregationBuffer } from './AggregationBuffer';
export type { PartialStateSnapshot } from './AggregationBuffer';
export { ActivationGate } from './ActivationGate';
