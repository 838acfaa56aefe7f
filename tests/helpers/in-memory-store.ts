import {
  findDeviceConflicts,
  locatorsEqual,
  MeasurementStore,
  resolveLimit,
} from '@/database/measurement.repository';
import { DeviceRegistration, IDevice } from '@/types/device.types';
import { FieldValues, IMeasurement, MeasurementQuery } from '@/types/measurement.types';
import { ConflictError, DuplicateError, NotFoundError } from '@/utils/errors';

/**
 * In-process stand-in for MongoMeasurementStore with the same
 * uniqueness and ordering rules.
 */
export class InMemoryMeasurementStore implements MeasurementStore {
  readonly devices = new Map<string, IDevice>();
  readonly measurements: IMeasurement[] = [];
  private pendingAppendErrors: Error[] = [];

  failNextAppend(error: Error): void {
    this.pendingAppendErrors.push(error);
  }

  async registerDevice(registration: DeviceRegistration): Promise<IDevice> {
    const existing = this.devices.get(registration.device_id);
    if (existing) {
      const conflicts = findDeviceConflicts(existing, registration);
      if (conflicts.length > 0) {
        throw new ConflictError(registration.device_id, conflicts);
      }
      if (!locatorsEqual(existing.locators, registration.locators)) {
        existing.locators = registration.locators;
      }
      return { ...existing };
    }

    const device: IDevice = {
      device_id: registration.device_id,
      name: registration.name,
      location: registration.location ?? null,
      endpoint: registration.endpoint,
      locators: registration.locators,
      created_at: new Date(),
    };
    this.devices.set(device.device_id, device);
    return { ...device };
  }

  async appendMeasurement(deviceId: string, timestamp: Date, fields: FieldValues): Promise<IMeasurement> {
    const pending = this.pendingAppendErrors.shift();
    if (pending) {
      throw pending;
    }
    if (!this.devices.has(deviceId)) {
      throw new NotFoundError(`Device ${deviceId} is not registered`);
    }
    const taken = this.measurements.some(
      (row) => row.device_id === deviceId && row.timestamp.getTime() === timestamp.getTime()
    );
    if (taken) {
      throw new DuplicateError(deviceId, timestamp);
    }

    const row: IMeasurement = { device_id: deviceId, timestamp, ...fields, created_at: new Date() };
    this.measurements.push(row);
    return { ...row };
  }

  async queryMeasurements(query: MeasurementQuery = {}): Promise<IMeasurement[]> {
    const { device_id, since } = query;
    return this.measurements
      .filter((row) => !device_id || row.device_id === device_id)
      .filter((row) => !since || row.timestamp.getTime() >= since.getTime())
      .sort(
        (a, b) =>
          b.timestamp.getTime() - a.timestamp.getTime() || a.device_id.localeCompare(b.device_id)
      )
      .slice(0, resolveLimit(query.limit))
      .map((row) => ({ ...row }));
  }

  async getLatestMeasurement(deviceId: string): Promise<IMeasurement | null> {
    const [latest] = await this.queryMeasurements({ device_id: deviceId, limit: 1 });
    return latest ?? null;
  }

  async listDevices(): Promise<IDevice[]> {
    return [...this.devices.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((device) => ({ ...device }));
  }

  async getDevice(deviceId: string): Promise<IDevice | null> {
    const device = this.devices.get(deviceId);
    return device ? { ...device } : null;
  }

  async getDeviceCount(): Promise<number> {
    return this.devices.size;
  }

  async getMeasurementCount(): Promise<number> {
    return this.measurements.length;
  }
}
