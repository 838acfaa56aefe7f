import { AppConfig } from '@/config';
import { MeasurementStore } from '@/database/measurement.repository';
import { ChangeDetector, ChangeDetectorOptions } from '@/services/change-detector.service';
import { extractReading } from '@/services/extraction.service';
import { fetchWithRetry, readinessMarker } from '@/services/fetch.service';
import { DeviceConfig } from '@/types/device.types';
import { DocumentFetcher, RetryPolicy } from '@/types/fetch.types';
import {
  CycleResult,
  CycleStatus,
  DevicePollerStatus,
  PollerHealth,
  PollerState,
  StatusProvider,
} from '@/types/poller.types';
import { sleep } from '@/utils/async.utils';
import { DuplicateError, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

export interface PollerOptions {
  intervalMs: number;
  maxConsecutiveFailures: number;
  fetchTimeoutMs: number;
  retry: RetryPolicy;
  seedFromStore: boolean;
  healthLogIntervalMs: number;        // 0 disables the periodic summary
  staleSuccessWarningMs: number;
  onUnhealthy?: (status: DevicePollerStatus) => void;
}

export interface PollerDependencies {
  store: MeasurementStore;
  fetcher: DocumentFetcher;
  detector: ChangeDetector;
  now?: () => Date;
}

export const buildPollerOptions = (
  config: AppConfig,
  onUnhealthy?: (status: DevicePollerStatus) => void
): PollerOptions => ({
  intervalMs: config.MONITOR.INTERVAL_SECONDS * 1000,
  maxConsecutiveFailures: config.MONITOR.MAX_CONSECUTIVE_FAILURES,
  fetchTimeoutMs: config.FETCH.TIMEOUT_MS,
  retry: { max_attempts: config.FETCH.MAX_ATTEMPTS, delay_ms: config.FETCH.RETRY_DELAY_MS },
  seedFromStore: config.CHANGE_DETECTION.SEED_FROM_STORE,
  healthLogIntervalMs: config.MONITOR.HEALTH_LOG_INTERVAL_SECONDS * 1000,
  staleSuccessWarningMs: config.MONITOR.STALE_SUCCESS_WARNING_SECONDS * 1000,
  onUnhealthy,
});

export const buildChangeDetectorOptions = (config: AppConfig): ChangeDetectorOptions => ({
  storeAll: config.CHANGE_DETECTION.STORE_ALL_READINGS,
  storeEmptyReadings: config.CHANGE_DETECTION.STORE_EMPTY_READINGS,
});

/**
 * One device's fetch -> extract -> detect -> persist loop. Cycles for a
 * device never overlap: a cycle that overruns the interval defers the next
 * start instead of skipping it. Nothing a cycle does can throw out of the
 * loop, so a failing device never affects another.
 */
export class DevicePoller {
  private state: PollerState = 'IDLE';
  private health: PollerHealth = 'HEALTHY';
  private consecutiveFailures = 0;
  private lastSuccessAt: Date | null = null;
  private lastAttemptAt: Date | null = null;
  private lastStoredAt: Date | null = null;
  private lastError: string | null = null;
  private checks = 0;
  private stored = 0;
  private skipped = 0;
  private errors = 0;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private startedAt: Date | null = null;
  private lastSummaryAt: Date | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly device: DeviceConfig,
    private readonly deps: PollerDependencies,
    private readonly options: PollerOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  get deviceId(): string {
    return this.device.device_id;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getStatus(): DevicePollerStatus {
    return {
      device_id: this.device.device_id,
      name: this.device.name,
      state: this.state,
      health: this.health,
      running: this.isRunning(),
      consecutive_failures: this.consecutiveFailures,
      last_success_at: this.lastSuccessAt,
      last_attempt_at: this.lastAttemptAt,
      last_stored_at: this.lastStoredAt,
      last_error: this.lastError,
      checks: this.checks,
      stored: this.stored,
      skipped: this.skipped,
      errors: this.errors,
    };
  }

  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.startedAt = this.now();
    this.lastSummaryAt = this.startedAt;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    logger.info(`Polling ${this.device.device_id} (${this.device.name}) every ${this.options.intervalMs / 1000}s`);
  }

  /**
   * Signal the loop to stop and wait up to `graceMs` for the current
   * cycle to wind down. Resolves true when the loop exited in time.
   */
  async stop(graceMs: number): Promise<boolean> {
    const loop = this.loop;
    if (!loop) {
      return true;
    }
    this.controller?.abort();

    let finished = false;
    const grace = new AbortController();
    try {
      await Promise.race([
        loop.then(() => {
          finished = true;
        }),
        sleep(graceMs, grace.signal),
      ]);
    } finally {
      grace.abort();
    }

    if (!finished) {
      logger.warn(`Poller for ${this.device.device_id} did not stop within ${graceMs}ms, abandoning its cycle`);
    }
    return finished;
  }

  /**
   * Rebuild the last fingerprint from the newest stored measurement so a
   * restart does not store the current value a second time.
   */
  async seed(): Promise<void> {
    if (!this.options.seedFromStore) {
      return;
    }
    try {
      const latest = await this.deps.store.getLatestMeasurement(this.device.device_id);
      if (!latest) {
        return;
      }
      const fingerprint = this.deps.detector.seed(this.device.device_id, {
        depth_mm: latest.depth_mm,
        velocity_mps: latest.velocity_mps,
        flow_lps: latest.flow_lps,
      });
      logger.debug(`Seeded ${this.device.device_id} with fingerprint ${fingerprint}`);
    } catch (error) {
      logger.warn(`Could not seed ${this.device.device_id} from the store: ${getErrorMessage(error)}`);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    await this.seed();
    let nextStart = Date.now();

    while (!signal.aborted) {
      try {
        await this.runCycle(signal);
      } catch (error) {
        // runCycle contains its own failures; anything here is a bug, keep polling
        this.recordFailure(`Unexpected cycle error: ${getErrorMessage(error)}`);
        logger.error(`Cycle for ${this.device.device_id} crashed: ${getErrorMessage(error)}`);
      }

      this.maybeLogHealthSummary();

      nextStart += this.options.intervalMs;
      const wait = nextStart - Date.now();
      if (wait < 0) {
        // Overran the interval: start again right away and re-anchor
        nextStart = Date.now();
      }
      await sleep(Math.max(0, wait), signal);
    }

    logger.info(`Poller for ${this.device.device_id} stopped`);
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const { device } = this;
    this.checks++;
    this.lastAttemptAt = this.now();

    try {
      this.state = 'FETCHING';
      const outcome = await fetchWithRetry(
        this.deps.fetcher,
        {
          endpoint: device.endpoint,
          timeout_ms: this.options.fetchTimeoutMs,
          ready_selector: device.fetch_mode === 'browser' ? readinessMarker(device) : undefined,
          signal,
        },
        this.options.retry
      );

      if (!outcome.success) {
        if (outcome.error.reason === 'aborted' && signal?.aborted) {
          this.checks--;
          return this.result('aborted', outcome.attempts, null);
        }
        logger.error(`Fetch for ${device.device_id} failed after ${outcome.attempts} attempt(s): ${outcome.error.message}`);
        this.recordFailure(outcome.error.message);
        return this.result('fetch_failed', outcome.attempts, null, outcome.error.message);
      }

      this.state = 'EXTRACTING';
      const { reading } = extractReading(device, outcome.document, this.now());

      this.state = 'DETECTING';
      const decision = this.deps.detector.evaluate(reading);

      if (!decision.store) {
        if (decision.reason === 'fetch_failed') {
          const message = `Document from ${device.endpoint} could not be parsed`;
          this.recordFailure(message);
          return this.result('fetch_failed', outcome.attempts, null, message);
        }
        this.skipped++;
        this.recordSuccess();
        logger.debug(`No change for ${device.device_id} (${decision.fingerprint ?? 'empty'})`);
        const status: CycleStatus = decision.reason === 'empty_reading' ? 'skipped_empty' : 'unchanged';
        return this.result(status, outcome.attempts, decision.fingerprint);
      }

      this.state = 'PERSISTING';
      try {
        await this.deps.store.appendMeasurement(device.device_id, reading.observed_at, reading.fields);
      } catch (error) {
        if (error instanceof DuplicateError) {
          logger.debug(error.message);
          this.recordSuccess();
          return this.result('duplicate', outcome.attempts, decision.fingerprint);
        }
        this.deps.detector.restore(device.device_id, decision.previous_fingerprint);
        const message = `Persisting ${device.device_id} failed: ${getErrorMessage(error)}`;
        logger.error(message);
        this.recordFailure(message);
        return this.result('persist_failed', outcome.attempts, null, message);
      }

      this.stored++;
      this.lastStoredAt = reading.observed_at;
      this.recordSuccess();
      logger.info(
        `Stored ${device.device_id} (${decision.reason}): depth_mm=${reading.fields.depth_mm} ` +
          `velocity_mps=${reading.fields.velocity_mps} flow_lps=${reading.fields.flow_lps}`
      );
      return this.result('stored', outcome.attempts, decision.fingerprint);
    } finally {
      this.state = 'IDLE';
    }
  }

  logHealthSummary(): void {
    const now = this.now();
    const status = this.getStatus();
    const successRate = status.checks > 0 ? ((status.checks - status.errors) / status.checks) * 100 : 0;
    const sinceSuccess = status.last_success_at
      ? `${Math.round((now.getTime() - status.last_success_at.getTime()) / 1000)}s ago`
      : 'never';

    logger.info(
      `Health ${status.device_id}: ${status.health}, checks=${status.checks}, stored=${status.stored}, ` +
        `errors=${status.errors}, consecutive_failures=${status.consecutive_failures}, ` +
        `last_success=${sinceSuccess}, success_rate=${successRate.toFixed(1)}%`
    );

    const reference = status.last_success_at ?? this.startedAt;
    if (reference && now.getTime() - reference.getTime() >= this.options.staleSuccessWarningMs) {
      logger.warn(`No successful cycle for ${status.device_id} since ${reference.toISOString()}`);
    }
    this.lastSummaryAt = now;
  }

  private maybeLogHealthSummary(): void {
    if (this.options.healthLogIntervalMs <= 0 || !this.lastSummaryAt) {
      return;
    }
    if (this.now().getTime() - this.lastSummaryAt.getTime() >= this.options.healthLogIntervalMs) {
      this.logHealthSummary();
    }
  }

  private recordSuccess(): void {
    const wasUnhealthy = this.health === 'UNHEALTHY';
    this.consecutiveFailures = 0;
    this.lastSuccessAt = this.now();
    this.lastError = null;
    this.health = 'HEALTHY';

    if (wasUnhealthy) {
      logger.notify(`${this.device.device_id} recovered and is HEALTHY again`);
    }
  }

  private recordFailure(message: string): void {
    this.consecutiveFailures++;
    this.errors++;
    this.lastError = message;

    if (this.health === 'HEALTHY' && this.consecutiveFailures >= this.options.maxConsecutiveFailures) {
      this.health = 'UNHEALTHY';
      logger.notify(`${this.device.device_id} is UNHEALTHY after ${this.consecutiveFailures} consecutive failures`);
      this.options.onUnhealthy?.(this.getStatus());
    }
  }

  private result(status: CycleStatus, attempts: number, fingerprint: string | null, error?: string): CycleResult {
    return { device_id: this.device.device_id, status, attempts, fingerprint, error };
  }
}

export interface SchedulerDependencies {
  store: MeasurementStore;
  fetcherFor: (device: DeviceConfig) => DocumentFetcher;
  changeDetection: Partial<ChangeDetectorOptions>;
  now?: () => Date;
}

/**
 * Owns one independent DevicePoller per configured device.
 */
export class PollingScheduler implements StatusProvider {
  private readonly pollers: DevicePoller[];

  constructor(devices: DeviceConfig[], deps: SchedulerDependencies, options: PollerOptions) {
    this.pollers = devices.map(
      (device) =>
        new DevicePoller(
          device,
          {
            store: deps.store,
            fetcher: deps.fetcherFor(device),
            detector: new ChangeDetector(deps.changeDetection),
            now: deps.now,
          },
          options
        )
    );
  }

  start(): void {
    logger.info(`Starting scheduler for ${this.pollers.length} device(s)`);
    for (const poller of this.pollers) {
      poller.start();
    }
  }

  async stop(graceMs: number): Promise<boolean> {
    const results = await Promise.all(this.pollers.map((poller) => poller.stop(graceMs)));
    return results.every(Boolean);
  }

  getPoller(deviceId: string): DevicePoller | undefined {
    return this.pollers.find((poller) => poller.deviceId === deviceId);
  }

  getStatuses(): DevicePollerStatus[] {
    return this.pollers.map((poller) => poller.getStatus());
  }
}
