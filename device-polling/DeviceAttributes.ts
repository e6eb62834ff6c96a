/**
 * Device Attributes
 * Attribute identifiers polled from the distance sensor and their logical channels
 */

import { ChannelName, CHANNELS } from '../shared/TelemetryTypes';

export type AttributeDataType = 'DINT';

// Class/instance/attribute path plus the data type it is read as
export interface DeviceAttribute {
  path: string;
  type: AttributeDataType;
}

export const SENSOR_ATTRIBUTES = {
  distance: { path: '@0x23/1/10', type: 'DINT' },
  velocity: { path: '@0x23/1/24', type: 'DINT' },
} as const satisfies Record<ChannelName, DeviceAttribute>;

export const POLLED_ATTRIBUTES: readonly DeviceAttribute[] = [
  SENSOR_ATTRIBUTES.distance,
  SENSOR_ATTRIBUTES.velocity,
];

export function formatAttribute(attribute: DeviceAttribute): string {
  return `${attribute.path} (${attribute.type})`;
}

/**
 * Logical name of a polled attribute. Unrecognized attributes map to their
 * formatted identifier so the aggregation layer reports them as unknown.
 */
export function attributeName(attribute: DeviceAttribute): string {
  if (matches(attribute, SENSOR_ATTRIBUTES.distance)) return CHANNELS.DISTANCE;
  if (matches(attribute, SENSOR_ATTRIBUTES.velocity)) return CHANNELS.VELOCITY;
  return formatAttribute(attribute);
}

function matches(a: DeviceAttribute, b: DeviceAttribute): boolean {
  return a.path === b.path && a.type === b.type;
}
