import * as CRC32 from 'crc-32';
import { FINGERPRINT_PRECISION } from '@/config/constants';
import { FieldValues, MEASUREMENT_FIELDS, MeasurementField } from '@/types/measurement.types';

const NULL_MARKER = 'null';
const PAIR_SEPARATOR = '|';
const KEY_VALUE_SEPARATOR = '=';

const SORTED_FIELDS: readonly MeasurementField[] = [...MEASUREMENT_FIELDS].sort();

/**
 * Fixed-precision rendering of a field value. Absent and non-finite values
 * become the null marker; negative zero collapses to zero.
 */
export function normalizeFieldValue(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return NULL_MARKER;
  }

  const fixed = value.toFixed(FINGERPRINT_PRECISION);
  return Number.parseFloat(fixed) === 0 ? (0).toFixed(FINGERPRINT_PRECISION) : fixed;
}

/**
 * Canonical serialization of a reading's fields: every known field, sorted
 * by name, e.g. "depth_mm=150.200|flow_lps=75.300|velocity_mps=null".
 */
export function canonicalizeFields(fields: Partial<FieldValues>): string {
  return SORTED_FIELDS
    .map(field => `${field}${KEY_VALUE_SEPARATOR}${normalizeFieldValue(fields[field])}`)
    .join(PAIR_SEPARATOR);
}

/**
 * CRC-32 of the canonical serialization as 8 lowercase hex characters.
 * Used for cheap equality tests between consecutive readings, not for integrity.
 */
export function computeFingerprint(fields: Partial<FieldValues>): string {
  const checksum = CRC32.str(canonicalizeFields(fields)) >>> 0;
  return checksum.toString(16).padStart(8, '0');
}

