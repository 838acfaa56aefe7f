import { Server } from 'http';
import { createApp } from './app';
import Config from '@/config';
import { connectDB, disconnectDB, ensureIndexes } from '@/database/connection';
import { MeasurementStore, MongoMeasurementStore } from '@/database/measurement.repository';
import {
  buildChangeDetectorOptions,
  buildPollerOptions,
  PollingScheduler,
} from '@/jobs/polling-scheduler.job';
import { loadDevicesConfig, toDeviceRegistration } from '@/services/config.service';
import { createFetcher } from '@/services/fetch.service';
import { DeviceConfig } from '@/types/device.types';
import { ConflictError, getErrorMessage } from '@/utils/errors';
import { logger } from '@/utils/logger';

/**
 * Register every configured device. A device whose stored metadata
 * conflicts is reported and left out of polling; the others continue.
 */
const registerDevices = async (store: MeasurementStore, devices: DeviceConfig[]): Promise<DeviceConfig[]> => {
  const registered: DeviceConfig[] = [];
  for (const device of devices) {
    try {
      await store.registerDevice(toDeviceRegistration(device));
      registered.push(device);
    } catch (error) {
      if (error instanceof ConflictError) {
        logger.error(`Skipping ${device.device_id}: ${error.message}`);
        continue;
      }
      throw error;
    }
  }
  return registered;
};

async function startServer() {
  let server: Server | null = null;
  let scheduler: PollingScheduler | null = null;
  let shuttingDown = false;

  const shutdown = async (exitCode: number) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down gracefully...');

    try {
      if (scheduler) {
        await scheduler.stop(Config.MONITOR.SHUTDOWN_GRACE_PERIOD_MS);
      }
      const listening = server;
      if (listening) {
        await new Promise<void>((resolve) => listening.close(() => resolve()));
      }
      await disconnectDB();
    } catch (error) {
      logger.error(`Error during shutdown: ${getErrorMessage(error)}`);
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  try {
    // Connect to MongoDB
    await connectDB();
    await ensureIndexes();
    logger.info('✓ MongoDB connected');

    const store = new MongoMeasurementStore();
    const devices = await registerDevices(store, loadDevicesConfig());
    logger.info(`✓ ${devices.length} device(s) registered`);

    const onUnhealthy = Config.MONITOR.EXIT_ON_UNHEALTHY
      ? () => {
          logger.notify('A device became UNHEALTHY and EXIT_ON_UNHEALTHY is set, exiting for restart');
          void shutdown(1);
        }
      : undefined;

    scheduler = new PollingScheduler(
      devices,
      {
        store,
        fetcherFor: (device) =>
          createFetcher(device.fetch_mode, {
            forceHttp: Config.FETCH.FORCE_HTTP,
            executablePath: Config.FETCH.CHROMIUM_EXECUTABLE_PATH,
            settleDelayMs: Config.FETCH.SETTLE_DELAY_MS,
          }),
        changeDetection: buildChangeDetectorOptions(Config),
      },
      buildPollerOptions(Config, onUnhealthy)
    );

    if (Config.MONITOR.ENABLED) {
      scheduler.start();
      logger.info('✓ Polling scheduler started');
    } else {
      logger.warn('⚠ MONITOR_ENABLED is false - serving stored data only');
    }

    // Start Express server
    const app = createApp({
      store,
      statusProvider: scheduler,
      healthMaxAgeSeconds: Config.HEALTH_MAX_AGE_SECONDS,
      allowedOrigins: Config.ALLOWED_ORIGINS?.length ? Config.ALLOWED_ORIGINS : undefined,
    });
    server = app.listen(Config.PORT, () => {
      logger.info(`✓ Server running on port ${Config.PORT}`);
    });

    // Graceful shutdown
    process.on('SIGINT', () => {
      void shutdown(0);
    });
    process.on('SIGTERM', () => {
      void shutdown(0);
    });
  } catch (error) {
    logger.error(`Failed to start server: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

void startServer();
