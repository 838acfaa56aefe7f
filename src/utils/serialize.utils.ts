import { IDevice } from '@/types/device.types';
import { IMeasurement } from '@/types/measurement.types';
import { DevicePollerStatus } from '@/types/poller.types';
import { formatTimestamp } from './time.utils';

const formatOptional = (date: Date | null): string | null => (date ? formatTimestamp(date) : null);

export const serializeDevice = (device: IDevice) => ({
  device_id: device.device_id,
  name: device.name,
  location: device.location,
  endpoint: device.endpoint,
  locators: device.locators,
  created_at: formatTimestamp(device.created_at),
});

export const serializeMeasurement = (measurement: IMeasurement) => ({
  device_id: measurement.device_id,
  timestamp: formatTimestamp(measurement.timestamp),
  depth_mm: measurement.depth_mm,
  velocity_mps: measurement.velocity_mps,
  flow_lps: measurement.flow_lps,
  created_at: formatTimestamp(measurement.created_at),
});

export const serializeStatus = (status: DevicePollerStatus) => ({
  ...status,
  last_success_at: formatOptional(status.last_success_at),
  last_attempt_at: formatOptional(status.last_attempt_at),
  last_stored_at: formatOptional(status.last_stored_at),
});
