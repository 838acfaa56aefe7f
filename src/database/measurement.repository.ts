import Device from '@/models/Device';
import Measurement from '@/models/Measurement';
import { QUERY_LIMITS } from '@/config/constants';
import { DeviceRegistration, FieldLocator, IDevice, LocatorMap } from '@/types/device.types';
import { FieldValues, IMeasurement, MEASUREMENT_FIELDS, MeasurementQuery } from '@/types/measurement.types';
import { ConflictError, DuplicateError, NotFoundError } from '@/utils/errors';
import { logger } from '@/utils/logger';

/**
 * Append-only measurement log plus device registry. The poller is the only
 * writer per device; dashboard reads may run at any time.
 */
export interface MeasurementStore {
  registerDevice(registration: DeviceRegistration): Promise<IDevice>;
  appendMeasurement(deviceId: string, timestamp: Date, fields: FieldValues): Promise<IMeasurement>;
  queryMeasurements(query?: MeasurementQuery): Promise<IMeasurement[]>;
  getLatestMeasurement(deviceId: string): Promise<IMeasurement | null>;
  listDevices(): Promise<IDevice[]>;
  getDevice(deviceId: string): Promise<IDevice | null>;
  getDeviceCount(): Promise<number>;
  getMeasurementCount(): Promise<number>;
}

export const resolveLimit = (limit?: number): number => {
  if (limit === undefined) {
    return QUERY_LIMITS.DEFAULT;
  }
  return Math.min(Math.max(Math.floor(limit), 1), QUERY_LIMITS.MAX);
};

const LOCATOR_KEYS: (keyof FieldLocator)[] = ['key', 'selector', 'json_path'];

export const locatorsEqual = (a: LocatorMap, b: LocatorMap): boolean => {
  return MEASUREMENT_FIELDS.every(field => {
    const left = a[field];
    const right = b[field];
    if (!left || !right) {
      return !left && !right;
    }
    return LOCATOR_KEYS.every(key => (left[key] ?? null) === (right[key] ?? null));
  });
};

/**
 * Identity metadata that may not change once a device exists.
 * Locator maps are config-driven and may be updated freely.
 */
export const findDeviceConflicts = (existing: IDevice, registration: DeviceRegistration): string[] => {
  const conflicts: string[] = [];
  if (existing.name !== registration.name) {
    conflicts.push('name');
  }
  if ((existing.location ?? null) !== (registration.location ?? null)) {
    conflicts.push('location');
  }
  if (existing.endpoint !== registration.endpoint) {
    conflicts.push('endpoint');
  }
  return conflicts;
};

export const isDuplicateKeyError = (error: unknown): boolean => {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
};

const toDevice = (doc: IDevice): IDevice => ({
  device_id: doc.device_id,
  name: doc.name,
  location: doc.location ?? null,
  endpoint: doc.endpoint,
  locators: doc.locators ?? {},
  created_at: doc.created_at,
});

const toMeasurement = (doc: IMeasurement): IMeasurement => ({
  device_id: doc.device_id,
  timestamp: doc.timestamp,
  depth_mm: doc.depth_mm ?? null,
  velocity_mps: doc.velocity_mps ?? null,
  flow_lps: doc.flow_lps ?? null,
  created_at: doc.created_at,
});

export class MongoMeasurementStore implements MeasurementStore {
  async registerDevice(registration: DeviceRegistration): Promise<IDevice> {
    const existing = await Device.findOne({ device_id: registration.device_id }).lean<IDevice>();
    if (existing) {
      return this.reconcileDevice(existing, registration);
    }

    try {
      const created = await Device.create({
        device_id: registration.device_id,
        name: registration.name,
        location: registration.location ?? null,
        endpoint: registration.endpoint,
        locators: registration.locators,
      });
      logger.info(`Registered device ${registration.device_id}`, { name: registration.name });
      return toDevice(created.toObject());
    } catch (error) {
      // Another process registered the same id between findOne and create
      if (isDuplicateKeyError(error)) {
        const winner = await Device.findOne({ device_id: registration.device_id }).lean<IDevice>();
        if (winner) {
          return this.reconcileDevice(winner, registration);
        }
      }
      throw error;
    }
  }

  private async reconcileDevice(existing: IDevice, registration: DeviceRegistration): Promise<IDevice> {
    const conflicts = findDeviceConflicts(existing, registration);
    if (conflicts.length > 0) {
      throw new ConflictError(registration.device_id, conflicts);
    }

    if (locatorsEqual(existing.locators ?? {}, registration.locators)) {
      return toDevice(existing);
    }

    await Device.updateOne(
      { device_id: registration.device_id },
      { $set: { locators: registration.locators } }
    );
    logger.info(`Updated locators for device ${registration.device_id}`);
    return toDevice({ ...existing, locators: registration.locators });
  }

  async appendMeasurement(deviceId: string, timestamp: Date, fields: FieldValues): Promise<IMeasurement> {
    const deviceExists = await Device.exists({ device_id: deviceId });
    if (!deviceExists) {
      throw new NotFoundError(`Device ${deviceId} is not registered`);
    }

    try {
      const created = await Measurement.create({
        device_id: deviceId,
        timestamp,
        depth_mm: fields.depth_mm,
        velocity_mps: fields.velocity_mps,
        flow_lps: fields.flow_lps,
      });
      return toMeasurement(created.toObject());
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateError(deviceId, timestamp);
      }
      throw error;
    }
  }

  async queryMeasurements(query: MeasurementQuery = {}): Promise<IMeasurement[]> {
    const filter: { device_id?: string; timestamp?: { $gte: Date } } = {};
    if (query.device_id) {
      filter.device_id = query.device_id;
    }
    if (query.since) {
      filter.timestamp = { $gte: query.since };
    }

    const rows = await Measurement.find(filter)
      .sort({ timestamp: -1, device_id: 1 })
      .limit(resolveLimit(query.limit))
      .lean<IMeasurement[]>();

    return rows.map(toMeasurement);
  }

  async getLatestMeasurement(deviceId: string): Promise<IMeasurement | null> {
    const row = await Measurement.findOne({ device_id: deviceId })
      .sort({ timestamp: -1 })
      .lean<IMeasurement>();
    return row ? toMeasurement(row) : null;
  }

  async listDevices(): Promise<IDevice[]> {
    const rows = await Device.find().sort({ name: 1 }).lean<IDevice[]>();
    return rows.map(toDevice);
  }

  async getDevice(deviceId: string): Promise<IDevice | null> {
    const row = await Device.findOne({ device_id: deviceId }).lean<IDevice>();
    return row ? toDevice(row) : null;
  }

  async getDeviceCount(): Promise<number> {
    return Device.countDocuments();
  }

  async getMeasurementCount(): Promise<number> {
    return Measurement.countDocuments();
  }
}
