import { validateDeviceEntry } from '@/services/device-validation.service';

describe('Device Validation Service', () => {
  const validEntry = {
    name: 'North Creek Gauge',
    location: 'Upper catchment',
    endpoint: 'https://telemetry.example.com/gauge/7',
    ready_selector: '#depth',
    locators: {
      depth_mm: { selector: '#depth' },
      flow_lps: { key: 'flow', json_path: 'data.flow' },
    },
  };

  test('should validate a complete device entry', () => {
    const result = validateDeviceEntry('NC7', validEntry);

    expect(result.valid).toBe(true);
    expect(result.device).toEqual({
      device_id: 'NC7',
      name: 'North Creek Gauge',
      location: 'Upper catchment',
      endpoint: 'https://telemetry.example.com/gauge/7',
      fetch_mode: 'browser',
      ready_selector: '#depth',
      locators: {
        depth_mm: { selector: '#depth' },
        flow_lps: { key: 'flow', json_path: 'data.flow' },
      },
    });
  });

  test('should default fetch mode to browser and accept http', () => {
    const result = validateDeviceEntry('NC7', { ...validEntry, fetch_mode: 'http' });
    expect(result.device?.fetch_mode).toBe('http');
  });

  test('should reject unknown fetch mode', () => {
    const result = validateDeviceEntry('NC7', { ...validEntry, fetch_mode: 'ftp' });
    expect(result.valid).toBe(false);
    expect(result.error).toContain('fetch_mode');
  });

  test('should reject ids with unsafe characters', () => {
    const result = validateDeviceEntry('north creek/7', validEntry);
    expect(result.valid).toBe(false);
    expect(result.error).toContain('may only contain');
  });

  test('should require a name', () => {
    const result = validateDeviceEntry('NC7', { ...validEntry, name: '  ' });
    expect(result.valid).toBe(false);
    expect(result.error).toBe("Device 'NC7' needs a non-empty name");
  });

  test('should require an http(s) endpoint', () => {
    const result = validateDeviceEntry('NC7', { ...validEntry, endpoint: 'ftp://telemetry.example.com' });
    expect(result.valid).toBe(false);
    expect(result.error).toBe("Device 'NC7' needs an http(s) endpoint");
  });

  test('should report unknown measurement fields', () => {
    const result = validateDeviceEntry('NC7', {
      ...validEntry,
      locators: { depth_mm: { selector: '#depth' }, turbidity: { selector: '#ntu' } },
    });

    expect(result.valid).toBe(false);
    expect(result.invalid_fields).toEqual(['turbidity']);
  });

  test('should reject empty locator entries', () => {
    const result = validateDeviceEntry('NC7', { ...validEntry, locators: { depth_mm: {} } });
    expect(result.valid).toBe(false);
    expect(result.error).toBe("Locator for 'depth_mm' on device 'NC7' needs a key, selector or json_path");
  });

  test('should allow a device without locators', () => {
    const { locators: _locators, ...withoutLocators } = validEntry;
    const result = validateDeviceEntry('NC7', withoutLocators);

    expect(result.valid).toBe(true);
    expect(result.device?.locators).toEqual({});
  });
});
