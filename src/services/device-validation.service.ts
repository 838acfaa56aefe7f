import { DeviceConfig, FetchMode, FieldLocator, LocatorMap, ValidationResult } from '@/types/device.types';
import { MEASUREMENT_FIELDS, MeasurementField } from '@/types/measurement.types';
import { isRecord } from '@/utils/object.utils';

export interface DeviceValidationResult extends ValidationResult {
  device?: DeviceConfig;
  invalid_fields?: string[];   // locator keys that are not known measurement fields
}

const DEVICE_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;
const FETCH_MODES: FetchMode[] = ['browser', 'http'];

export const toMeasurementField = (name: string): MeasurementField | undefined => {
  return MEASUREMENT_FIELDS.find(field => field === name);
};

const optionalString = (value: unknown): string | undefined | null => {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  return value.trim();
};

const parseLocator = (raw: unknown): FieldLocator | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const locator: FieldLocator = {};
  for (const key of ['key', 'selector', 'json_path'] as const) {
    const value = optionalString(raw[key]);
    if (value === null) {
      return null;
    }
    if (value !== undefined) {
      locator[key] = value;
    }
  }
  return Object.keys(locator).length > 0 ? locator : null;
};

/**
 * Validate one entry of the devices configuration file and normalize it
 * into a DeviceConfig.
 */
export const validateDeviceEntry = (device_id: string, raw: unknown): DeviceValidationResult => {
  // 1. Identifier
  if (!DEVICE_ID_PATTERN.test(device_id)) {
    return { valid: false, error: `Device id '${device_id}' may only contain letters, digits, '.', '_' and '-'` };
  }

  if (!isRecord(raw)) {
    return { valid: false, error: `Device '${device_id}' must be an object` };
  }

  // 2. Display name and endpoint
  const name = optionalString(raw.name);
  if (!name) {
    return { valid: false, error: `Device '${device_id}' needs a non-empty name` };
  }

  const endpoint = optionalString(raw.endpoint);
  if (!endpoint || !/^https?:\/\//i.test(endpoint)) {
    return { valid: false, error: `Device '${device_id}' needs an http(s) endpoint` };
  }

  const location = optionalString(raw.location);
  if (location === null) {
    return { valid: false, error: `Device '${device_id}' location must be a non-empty string` };
  }

  // 3. Fetch mode and readiness marker
  const fetchMode = FETCH_MODES.find(mode => mode === (raw.fetch_mode ?? 'browser'));
  if (!fetchMode) {
    return { valid: false, error: `Device '${device_id}' fetch_mode must be one of: ${FETCH_MODES.join(', ')}` };
  }

  const readySelector = optionalString(raw.ready_selector);
  if (readySelector === null) {
    return { valid: false, error: `Device '${device_id}' ready_selector must be a non-empty string` };
  }

  // 4. Locators
  const rawLocators = raw.locators ?? {};
  if (!isRecord(rawLocators)) {
    return { valid: false, error: `Device '${device_id}' locators must be an object` };
  }

  const invalidFields = Object.keys(rawLocators).filter(key => !toMeasurementField(key));
  if (invalidFields.length > 0) {
    return {
      valid: false,
      error: `Unknown measurement fields for device '${device_id}'`,
      invalid_fields: invalidFields
    };
  }

  const locators: LocatorMap = {};
  for (const [key, value] of Object.entries(rawLocators)) {
    const field = toMeasurementField(key);
    const locator = parseLocator(value);
    if (!field || !locator) {
      return { valid: false, error: `Locator for '${key}' on device '${device_id}' needs a key, selector or json_path` };
    }
    locators[field] = locator;
  }

  return {
    valid: true,
    device: {
      device_id,
      name,
      location,
      endpoint,
      fetch_mode: fetchMode,
      ready_selector: readySelector,
      locators,
    }
  };
};
