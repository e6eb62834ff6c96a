export { IntervalPollingEngine } from './IntervalPollingEngine';
export type { IntervalPollingConfig, PollStats } from './IntervalPollingEngine';
export type {
  PollingEngine,
  PollSubscription,
  PollSubscriptionRequest,
  AttributeCallback,
  AttributeReader,
  AttributeReaderFactory,
  DeviceAddress,
} from './PollingEngine';
export {
  SENSOR_ATTRIBUTES,
  POLLED_ATTRIBUTES,
  attributeName,
  formatAttribute,
} from './DeviceAttributes';
export type { DeviceAttribute, AttributeDataType } from './DeviceAttributes';
