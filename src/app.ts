import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createMeasurementController } from '@/controllers/measurement.controller';
import { createStatusController } from '@/controllers/status.controller';
import { MeasurementStore } from '@/database/measurement.repository';
import { errorHandler } from '@/middleware/errorHandler';
import { createDeviceRoutes } from '@/routes/device.routes';
import { createMeasurementRoutes } from '@/routes/measurement.routes';
import { StatusProvider } from '@/types/poller.types';

export interface AppDependencies {
  store: MeasurementStore;
  statusProvider: StatusProvider;
  healthMaxAgeSeconds: number;
  allowedOrigins?: string[];
  now?: () => Date;
}

/**
 * Read-only HTTP surface over the measurement store and poller health.
 */
export const createApp = (deps: AppDependencies): Express => {
  const app = express();
  const measurements = createMeasurementController(deps.store);
  const status = createStatusController({
    store: deps.store,
    statusProvider: deps.statusProvider,
    healthMaxAgeSeconds: deps.healthMaxAgeSeconds,
    now: deps.now,
  });

  // Middleware
  app.use(express.json({ limit: '10kb' }));
  app.use(helmet());
  app.use(cors({ origin: deps.allowedOrigins }));

  // Routes
  app.use('/api/v1/devices', createDeviceRoutes(measurements));
  app.use('/api/v1', createMeasurementRoutes(measurements, status));

  // Health check
  app.get('/health', status.getHealth);

  // Error Handler
  app.use(errorHandler);

  return app;
};

export default createApp;
