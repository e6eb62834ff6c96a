import { AttributeReader, DeviceAddress } from '../../device-polling/PollingEngine';
import { SENSOR_ATTRIBUTES } from '../../device-polling/DeviceAttributes';

export function createReader(address: DeviceAddress): AttributeReader {
  return {
    read: async (attribute) => (attribute.path === SENSOR_ATTRIBUTES.distance.path ? [address.port] : [7]),
  };
}
