import { Router } from 'express';
import { MeasurementController } from '@/controllers/measurement.controller';

export const createDeviceRoutes = (controller: MeasurementController): Router => {
  const router = Router();

  router.route('/').get(controller.listDevices);
  router.route('/:deviceId').get(controller.getDevice);
  router.route('/:deviceId/measurements').get(controller.getDeviceMeasurements);

  return router;
};
