import { NextFunction, Request, Response } from 'express';
import { MeasurementStore } from '@/database/measurement.repository';
import { MeasurementQuery } from '@/types/measurement.types';
import { NotFoundError, ValidationError } from '@/utils/errors';
import { serializeDevice, serializeMeasurement } from '@/utils/serialize.utils';
import { parseTimestamp } from '@/utils/time.utils';

type QueryValue = Request['query'][string];

const singleValue = (name: string, value: QueryValue): string | undefined => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${name} must be given once`);
  }
  return value;
};

/**
 * Validate `since` (ISO-8601, canonical zone when no offset) and `limit`
 * (positive integer; the store caps it).
 */
export const parseMeasurementQuery = (query: Request['query'], deviceId?: string): MeasurementQuery => {
  const parsed: MeasurementQuery = {};

  const device_id = deviceId ?? singleValue('device_id', query.device_id);
  if (device_id !== undefined) {
    if (!device_id.trim()) {
      throw new ValidationError('device_id cannot be empty');
    }
    parsed.device_id = device_id.trim();
  }

  const since = singleValue('since', query.since);
  if (since !== undefined) {
    const date = parseTimestamp(since);
    if (!date) {
      throw new ValidationError(`since must be an ISO-8601 timestamp, got: ${since}`);
    }
    parsed.since = date;
  }

  const limit = singleValue('limit', query.limit);
  if (limit !== undefined) {
    if (!/^\d+$/.test(limit) || Number(limit) < 1) {
      throw new ValidationError(`limit must be a positive integer, got: ${limit}`);
    }
    parsed.limit = Number(limit);
  }

  return parsed;
};

export const createMeasurementController = (store: MeasurementStore) => ({
  listDevices: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const devices = await store.listDevices();
      res.json({ success: true, data: devices.map(serializeDevice) });
    } catch (error) {
      next(error);
    }
  },

  getDevice: async (req: Request<{ deviceId: string }>, res: Response, next: NextFunction): Promise<void> => {
    try {
      const device = await store.getDevice(req.params.deviceId);
      if (!device) {
        throw new NotFoundError(`Device ${req.params.deviceId} not found`);
      }
      res.json({ success: true, data: serializeDevice(device) });
    } catch (error) {
      next(error);
    }
  },

  getMeasurements: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseMeasurementQuery(req.query);
      const rows = await store.queryMeasurements(query);
      res.json({ success: true, count: rows.length, data: rows.map(serializeMeasurement) });
    } catch (error) {
      next(error);
    }
  },

  getDeviceMeasurements: async (
    req: Request<{ deviceId: string }>,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const device = await store.getDevice(req.params.deviceId);
      if (!device) {
        throw new NotFoundError(`Device ${req.params.deviceId} not found`);
      }
      const rows = await store.queryMeasurements(parseMeasurementQuery(req.query, device.device_id));
      res.json({ success: true, count: rows.length, data: rows.map(serializeMeasurement) });
    } catch (error) {
      next(error);
    }
  },

  getStats: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const [device_count, measurement_count] = await Promise.all([
        store.getDeviceCount(),
        store.getMeasurementCount(),
      ]);
      res.json({ success: true, data: { device_count, measurement_count } });
    } catch (error) {
      next(error);
    }
  },
});

export type MeasurementController = ReturnType<typeof createMeasurementController>;
