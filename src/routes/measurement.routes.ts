import { Router } from 'express';
import { MeasurementController } from '@/controllers/measurement.controller';
import { StatusController } from '@/controllers/status.controller';

export const createMeasurementRoutes = (
  controller: MeasurementController,
  statusController: StatusController
): Router => {
  const router = Router();

  router.get('/measurements', controller.getMeasurements);
  router.get('/stats', controller.getStats);
  router.get('/status', statusController.getStatus);

  return router;
};
