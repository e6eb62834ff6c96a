export { SyntheticSource, SYNTHETIC_DEFAULTS } from './SyntheticSource';
export type { SyntheticSourceOptions, SyntheticTick } from './SyntheticSource';
export { SyntheticStreamer } from './SyntheticStreamer';
export type { SyntheticStreamerConfig, SyntheticStreamerStats, SyntheticRecordHandler } from './SyntheticStreamer';
