export { TelemetryBridge } from './TelemetryBridge';
export type { TelemetryBridgeConfig, TelemetryBridgeDeps, SyntheticOptions, BridgeStats } from './TelemetryBridge';
export { DEFAULT_BRIDGE_CONFIG, resolveBridgeConfig, validateMode } from './BridgeConfig';
export type { BridgeConfig, BridgeConfigInput } from './BridgeConfig';

export * from '../frame-protocol';
export * from '../aggregation';
export * from '../synthetic-source';
export * from '../device-polling';
export * from '../publish-channel';
export * from '../shared/TelemetryTypes';
export * from '../shared/BridgeErrors';
export { configureLogging, createLogger, silentLogger } from '../shared/Logger';
export type { Logger, LoggingOptions } from '../shared/Logger';
