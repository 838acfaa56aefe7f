import fs from 'fs';
import path from 'path';
import Config, { ConfigurationError } from '@/config';
import { DeviceConfig, DeviceRegistration } from '@/types/device.types';
import { isRecord } from '@/utils/object.utils';
import { validateDeviceEntry } from './device-validation.service';

/**
 * Read and validate the device configuration file. Loaded once at startup;
 * edits need a restart.
 */
export const loadDevicesConfig = (filePath: string = Config.DEVICES_CONFIG_PATH): DeviceConfig[] => {
  const absolutePath = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Devices configuration not found at ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Devices configuration at ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseDevicesConfig(parsed);
};

export const parseDevicesConfig = (parsed: unknown): DeviceConfig[] => {
  if (!isRecord(parsed) || !isRecord(parsed.devices)) {
    throw new ConfigurationError('Devices configuration must contain a "devices" object');
  }

  const devices: DeviceConfig[] = [];
  for (const [device_id, entry] of Object.entries(parsed.devices)) {
    const result = validateDeviceEntry(device_id, entry);
    if (!result.valid || !result.device) {
      const detail = result.invalid_fields ? ` (${result.invalid_fields.join(', ')})` : '';
      throw new ConfigurationError(`${result.error ?? `Invalid device '${device_id}'`}${detail}`);
    }
    devices.push(result.device);
  }

  if (devices.length === 0) {
    throw new ConfigurationError('Devices configuration does not define any devices');
  }

  return devices;
};

export const toDeviceRegistration = (device: DeviceConfig): DeviceRegistration => ({
  device_id: device.device_id,
  name: device.name,
  location: device.location,
  endpoint: device.endpoint,
  locators: device.locators,
});
