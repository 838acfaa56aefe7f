import { NextFunction, Request, Response } from 'express';
import { MeasurementStore } from '@/database/measurement.repository';
import { evaluateHealth } from '@/services/health.service';
import { StatusProvider } from '@/types/poller.types';
import { formatTimestamp } from '@/utils/time.utils';
import { serializeStatus } from '@/utils/serialize.utils';

export interface StatusControllerOptions {
  store: MeasurementStore;
  statusProvider: StatusProvider;
  healthMaxAgeSeconds: number;
  now?: () => Date;
}

export const createStatusController = (options: StatusControllerOptions) => {
  const now = options.now ?? (() => new Date());

  return {
    getStatus: (req: Request, res: Response): void => {
      res.json({ success: true, data: options.statusProvider.getStatuses().map(serializeStatus) });
    },

    getHealth: async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const [latest] = await options.store.queryMeasurements({ limit: 1 });
        const statuses = options.statusProvider.getStatuses();
        const report = evaluateHealth(latest ?? null, statuses, options.healthMaxAgeSeconds, now());

        res.status(report.healthy ? 200 : 503).json({
          status: report.healthy ? 'ok' : 'unhealthy',
          reason: report.reason,
          latest_timestamp: report.latest_timestamp ? formatTimestamp(report.latest_timestamp) : null,
          age_seconds: report.age_seconds,
          unhealthy_devices: report.unhealthy_devices,
          devices: statuses.length,
          timestamp: formatTimestamp(now()),
        });
      } catch (error) {
        next(error);
      }
    },
  };
};

export type StatusController = ReturnType<typeof createStatusController>;
