import { MeasurementField } from './measurement.types';

export type FetchMode = 'browser' | 'http';

// Where to find one field's raw value in a fetched document
export interface FieldLocator {
  key?: string;               // property name inside an embedded JSON payload
  selector?: string;          // CSS selector for HTML documents
  json_path?: string;         // dotted path for JSON documents, e.g. "data.points.0.value"
}

export type LocatorMap = Partial<Record<MeasurementField, FieldLocator>>;

export interface DeviceConfig {
  device_id: string;
  name: string;
  location?: string;
  endpoint: string;
  fetch_mode: FetchMode;
  ready_selector?: string;
  locators: LocatorMap;
}

export interface IDevice {
  device_id: string;
  name: string;
  location: string | null;
  endpoint: string;
  locators: LocatorMap;
  created_at: Date;
}

export interface DeviceRegistration {
  device_id: string;
  name: string;
  location?: string;
  endpoint: string;
  locators: LocatorMap;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}
