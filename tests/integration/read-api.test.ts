import request from 'supertest';
import { createApp } from '@/app';
import { DevicePollerStatus } from '@/types/poller.types';
import { InMemoryMeasurementStore } from '../helpers/in-memory-store';

const status = (device_id: string, overrides: Partial<DevicePollerStatus> = {}): DevicePollerStatus => ({
  device_id,
  name: `Gauge ${device_id}`,
  state: 'IDLE',
  health: 'HEALTHY',
  running: true,
  consecutive_failures: 0,
  last_success_at: new Date('2024-06-01T01:00:00.000Z'),
  last_attempt_at: new Date('2024-06-01T01:00:00.000Z'),
  last_stored_at: null,
  last_error: null,
  checks: 4,
  stored: 2,
  skipped: 2,
  errors: 0,
  ...overrides,
});

describe('Read API Integration', () => {
  let store: InMemoryMeasurementStore;
  let statuses: DevicePollerStatus[];

  const appAt = (now: string) =>
    createApp({
      store,
      statusProvider: { getStatuses: () => statuses },
      healthMaxAgeSeconds: 900,
      now: () => new Date(now),
    });

  const app = () => appAt('2024-06-01T01:05:00.000Z');

  beforeEach(async () => {
    store = new InMemoryMeasurementStore();
    statuses = [status('A1'), status('B1')];

    await store.registerDevice({
      device_id: 'B1',
      name: 'Bravo Creek',
      endpoint: 'https://telemetry.example.com/b1',
      locators: {},
    });
    await store.registerDevice({
      device_id: 'A1',
      name: 'Alpha Weir',
      location: 'Upper catchment',
      endpoint: 'https://telemetry.example.com/a1',
      locators: { depth_mm: { selector: '#depth' } },
    });

    await store.appendMeasurement('A1', new Date('2024-06-01T00:00:00.000Z'), {
      depth_mm: 100,
      velocity_mps: 0,
      flow_lps: null,
    });
    await store.appendMeasurement('B1', new Date('2024-06-01T00:30:00.000Z'), {
      depth_mm: 55.5,
      velocity_mps: 1.2,
      flow_lps: 8,
    });
    await store.appendMeasurement('A1', new Date('2024-06-01T01:00:00.000Z'), {
      depth_mm: 101,
      velocity_mps: 0,
      flow_lps: null,
    });
  });

  describe('GET /api/v1/devices', () => {
    test('should list devices sorted by name', async () => {
      const res = await request(app()).get('/api/v1/devices').expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.map((device: { device_id: string }) => device.device_id)).toEqual(['A1', 'B1']);
      expect(res.body.data[0]).toMatchObject({
        name: 'Alpha Weir',
        location: 'Upper catchment',
        locators: { depth_mm: { selector: '#depth' } },
      });
      expect(res.body.data[1].location).toBeNull();
    });

    test('should return one device', async () => {
      const res = await request(app()).get('/api/v1/devices/B1').expect(200);
      expect(res.body.data.name).toBe('Bravo Creek');
    });

    test('should return 404 for an unknown device', async () => {
      const res = await request(app()).get('/api/v1/devices/ZZ').expect(404);

      expect(res.body).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Device ZZ not found' },
      });
    });
  });

  describe('GET /api/v1/measurements', () => {
    test('should return every device newest first with canonical timestamps', async () => {
      const res = await request(app()).get('/api/v1/measurements').expect(200);

      expect(res.body.count).toBe(3);
      expect(res.body.data.map((row: { timestamp: string }) => row.timestamp)).toEqual([
        '2024-06-01T11:00:00.000+10:00',
        '2024-06-01T10:30:00.000+10:00',
        '2024-06-01T10:00:00.000+10:00',
      ]);
      expect(res.body.data[0]).toMatchObject({ device_id: 'A1', depth_mm: 101, velocity_mps: 0, flow_lps: null });
    });

    test('should filter by device and limit', async () => {
      const res = await request(app()).get('/api/v1/measurements?device_id=A1&limit=1').expect(200);

      expect(res.body.count).toBe(1);
      expect(res.body.data[0]).toMatchObject({ device_id: 'A1', timestamp: '2024-06-01T11:00:00.000+10:00' });
    });

    test('should treat since as inclusive and read it in the canonical zone', async () => {
      const res = await request(app()).get('/api/v1/measurements?since=2024-06-01T10:30:00').expect(200);

      expect(res.body.data.map((row: { device_id: string }) => row.device_id)).toEqual(['A1', 'B1']);
    });

    test('should reject a malformed limit', async () => {
      const res = await request(app()).get('/api/v1/measurements?limit=abc').expect(400);

      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'limit must be a positive integer, got: abc',
      });
    });

    test('should reject a malformed since', async () => {
      const res = await request(app()).get('/api/v1/measurements?since=yesterday').expect(400);
      expect(res.body.error.message).toBe('since must be an ISO-8601 timestamp, got: yesterday');
    });

    test('should reject repeated parameters', async () => {
      const res = await request(app()).get('/api/v1/measurements?limit=1&limit=2').expect(400);
      expect(res.body.error.message).toBe('limit must be given once');
    });
  });

  describe('GET /api/v1/devices/:deviceId/measurements', () => {
    test('should scope rows to the device', async () => {
      const res = await request(app()).get('/api/v1/devices/A1/measurements').expect(200);

      expect(res.body.count).toBe(2);
      expect(res.body.data.map((row: { depth_mm: number }) => row.depth_mm)).toEqual([101, 100]);
    });

    test('should return 404 for an unknown device', async () => {
      await request(app()).get('/api/v1/devices/ZZ/measurements').expect(404);
    });
  });

  describe('GET /api/v1/stats and /api/v1/status', () => {
    test('should report counts', async () => {
      const res = await request(app()).get('/api/v1/stats').expect(200);
      expect(res.body.data).toEqual({ device_count: 2, measurement_count: 3 });
    });

    test('should report per-device health', async () => {
      statuses = [status('A1', { health: 'UNHEALTHY', consecutive_failures: 12, last_error: 'failed: timeout' })];

      const res = await request(app()).get('/api/v1/status').expect(200);

      expect(res.body.data).toEqual([
        {
          device_id: 'A1',
          name: 'Gauge A1',
          state: 'IDLE',
          health: 'UNHEALTHY',
          running: true,
          consecutive_failures: 12,
          last_success_at: '2024-06-01T11:00:00.000+10:00',
          last_attempt_at: '2024-06-01T11:00:00.000+10:00',
          last_stored_at: null,
          last_error: 'failed: timeout',
          checks: 4,
          stored: 2,
          skipped: 2,
          errors: 0,
        },
      ]);
    });
  });

  describe('GET /health', () => {
    test('should be healthy with fresh data and healthy pollers', async () => {
      const res = await request(app()).get('/health').expect(200);

      expect(res.body).toMatchObject({
        status: 'ok',
        reason: 'ok',
        latest_timestamp: '2024-06-01T11:00:00.000+10:00',
        age_seconds: 300,
        unhealthy_devices: [],
        devices: 2,
        timestamp: '2024-06-01T11:05:00.000+10:00',
      });
    });

    test('should report stale data', async () => {
      const res = await request(appAt('2024-06-01T02:00:00.000Z')).get('/health').expect(503);

      expect(res.body.status).toBe('unhealthy');
      expect(res.body.reason).toBe('stale:3600s');
    });

    test('should report unhealthy devices', async () => {
      statuses = [status('A1'), status('B1', { health: 'UNHEALTHY' })];

      const res = await request(app()).get('/health').expect(503);

      expect(res.body.reason).toBe('unhealthy_devices');
      expect(res.body.unhealthy_devices).toEqual(['B1']);
    });

    test('should report an empty store', async () => {
      store = new InMemoryMeasurementStore();

      const res = await request(app()).get('/health').expect(503);

      expect(res.body.reason).toBe('no_measurements');
      expect(res.body.latest_timestamp).toBeNull();
    });
  });
});
