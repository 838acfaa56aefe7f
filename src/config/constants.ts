import { FieldDefinition, MeasurementField } from '@/types/measurement.types';

export const FIELD_DEFINITIONS: Record<MeasurementField, FieldDefinition> = {
  depth_mm: {
    label: 'Depth',
    aliases: ['water level', 'depth', 'level'],
    units: ['mm'],
    payload_keys: ['depth_mm', 'depth'],
  },
  velocity_mps: {
    label: 'Velocity',
    aliases: ['velocity', 'speed'],
    units: ['m/s', 'mps'],
    payload_keys: ['velocity_mps', 'velocity'],
  },
  flow_lps: {
    label: 'Flow',
    aliases: ['flow rate', 'discharge', 'flow'],
    units: ['l/s', 'lps'],
    payload_keys: ['flow_lps', 'flow'],
  },
};

// Decimal places kept when fingerprinting a reading
export const FINGERPRINT_PRECISION = 3;

export const QUERY_LIMITS = {
  DEFAULT: 1000,
  MAX: 10000,
} as const;

export const FETCH_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
  'User-Agent': 'flowwatch/1.0 (+hydrological monitor)',
} as const;

export const BROWSER_CONFIG = {
  ARGS: ['--no-sandbox', '--disable-dev-shm-usage'],
  VIEWPORT: { width: 1920, height: 1080 },
} as const;
