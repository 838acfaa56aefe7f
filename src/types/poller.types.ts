export type PollerState = 'IDLE' | 'FETCHING' | 'EXTRACTING' | 'DETECTING' | 'PERSISTING';

export type PollerHealth = 'HEALTHY' | 'UNHEALTHY';

export type CycleStatus =
  | 'stored'
  | 'unchanged'
  | 'skipped_empty'
  | 'duplicate'
  | 'fetch_failed'
  | 'persist_failed'
  | 'aborted';

export interface CycleResult {
  device_id: string;
  status: CycleStatus;
  attempts: number;
  fingerprint: string | null;
  error?: string;
}

// Operator-facing health signal for one device
export interface DevicePollerStatus {
  device_id: string;
  name: string;
  state: PollerState;
  health: PollerHealth;
  running: boolean;
  consecutive_failures: number;
  last_success_at: Date | null;
  last_attempt_at: Date | null;
  last_stored_at: Date | null;
  last_error: string | null;
  checks: number;
  stored: number;
  skipped: number;
  errors: number;
}

export interface StatusProvider {
  getStatuses(): DevicePollerStatus[];
}
