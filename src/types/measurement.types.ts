export const MEASUREMENT_FIELDS = ['depth_mm', 'velocity_mps', 'flow_lps'] as const;

export type MeasurementField = typeof MEASUREMENT_FIELDS[number];

// null means "could not be extracted", never zero
export type FieldValues = Record<MeasurementField, number | null>;

export interface FieldDefinition {
  label: string;
  aliases: string[];         // case-insensitive labels used by the text scan, longest first
  units: string[];           // accepted unit suffixes
  payload_keys: string[];    // default keys for the structured lookup
}

export interface Reading {
  device_id: string;
  observed_at: Date;
  fields: FieldValues;
  fetch_success: boolean;
}

export interface IMeasurement {
  device_id: string;
  timestamp: Date;
  depth_mm: number | null;
  velocity_mps: number | null;
  flow_lps: number | null;
  created_at: Date;
}

export interface MeasurementQuery {
  device_id?: string;
  since?: Date;
  limit?: number;
}

export type ChangeDecisionReason =
  | 'fetch_failed'
  | 'first_reading'
  | 'changed'
  | 'unchanged'
  | 'store_all'
  | 'empty_reading';

export interface ChangeDecision {
  store: boolean;
  reason: ChangeDecisionReason;
  fingerprint: string | null;
  previous_fingerprint: string | null;
}
