import { ChangeDecision, FieldValues, MEASUREMENT_FIELDS, Reading } from '@/types/measurement.types';
import { computeFingerprint } from '@/utils/hash.utils';

export interface ChangeDetectorOptions {
  storeAll: boolean;            // persist every successful reading, duplicates included
  storeEmptyReadings: boolean;  // persist readings where every field is absent
}

const DEFAULT_OPTIONS: ChangeDetectorOptions = {
  storeAll: false,
  storeEmptyReadings: true,
};

export const isEmptyReading = (fields: FieldValues): boolean =>
  MEASUREMENT_FIELDS.every((field) => fields[field] === null);

/**
 * Remembers the fingerprint of the last reading accepted for storage per
 * device. Owned by a single poller; devices never share an instance.
 */
export class ChangeDetector {
  private readonly fingerprints = new Map<string, string>();
  private readonly options: ChangeDetectorOptions;

  constructor(options: Partial<ChangeDetectorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Decide whether `reading` should be stored. A positive decision
   * records the new fingerprint immediately; call `restore` if the write
   * then fails so the next identical reading is retried.
   */
  evaluate(reading: Reading): ChangeDecision {
    const previous = this.fingerprints.get(reading.device_id) ?? null;

    if (!reading.fetch_success) {
      return { store: false, reason: 'fetch_failed', fingerprint: null, previous_fingerprint: previous };
    }

    const fingerprint = computeFingerprint(reading.fields);

    if (!this.options.storeEmptyReadings && isEmptyReading(reading.fields)) {
      return { store: false, reason: 'empty_reading', fingerprint, previous_fingerprint: previous };
    }

    if (previous === null) {
      this.fingerprints.set(reading.device_id, fingerprint);
      return { store: true, reason: 'first_reading', fingerprint, previous_fingerprint: null };
    }

    if (previous !== fingerprint) {
      this.fingerprints.set(reading.device_id, fingerprint);
      return { store: true, reason: 'changed', fingerprint, previous_fingerprint: previous };
    }

    if (this.options.storeAll) {
      return { store: true, reason: 'store_all', fingerprint, previous_fingerprint: previous };
    }

    return { store: false, reason: 'unchanged', fingerprint, previous_fingerprint: previous };
  }

  shouldStore(reading: Reading): boolean {
    return this.evaluate(reading).store;
  }

  // Put back the fingerprint that was current before a failed write
  restore(deviceId: string, previous: string | null): void {
    if (previous === null) {
      this.fingerprints.delete(deviceId);
    } else {
      this.fingerprints.set(deviceId, previous);
    }
  }

  // Prime from the newest stored row so a restart does not re-store it
  seed(deviceId: string, fields: FieldValues): string {
    const fingerprint = computeFingerprint(fields);
    this.fingerprints.set(deviceId, fingerprint);
    return fingerprint;
  }

  getFingerprint(deviceId: string): string | null {
    return this.fingerprints.get(deviceId) ?? null;
  }
}
