import { IMeasurement } from '@/types/measurement.types';
import { DevicePollerStatus } from '@/types/poller.types';
import { secondsSince } from '@/utils/time.utils';

export interface HealthReport {
  healthy: boolean;
  reason: string;
  latest_timestamp: Date | null;
  age_seconds: number | null;
  unhealthy_devices: string[];
}

/**
 * Overall ingestion health: data must be fresher than `maxAgeSeconds`
 * and every poller must be HEALTHY.
 */
export const evaluateHealth = (
  latest: IMeasurement | null,
  statuses: DevicePollerStatus[],
  maxAgeSeconds: number,
  now: Date = new Date()
): HealthReport => {
  const unhealthy_devices = statuses
    .filter((status) => status.health === 'UNHEALTHY')
    .map((status) => status.device_id);

  if (!latest) {
    return { healthy: false, reason: 'no_measurements', latest_timestamp: null, age_seconds: null, unhealthy_devices };
  }

  const age_seconds = secondsSince(latest.timestamp, now);
  const base = { latest_timestamp: latest.timestamp, age_seconds, unhealthy_devices };

  if (age_seconds > maxAgeSeconds) {
    return { healthy: false, reason: `stale:${age_seconds}s`, ...base };
  }
  if (unhealthy_devices.length > 0) {
    return { healthy: false, reason: 'unhealthy_devices', ...base };
  }
  return { healthy: true, reason: 'ok', ...base };
};
