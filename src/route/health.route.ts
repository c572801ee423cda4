import { Router } from 'express';
import { createHealthController, DatabaseHealthCheck } from '../controller/health.controller';
import { asyncHandler } from '../middleware/gateway.errorHandler.middleware';

export const createHealthRouter = (serviceName: string, checkDatabase: DatabaseHealthCheck): Router => {
  const router: Router = Router();
  const controller = createHealthController(serviceName, checkDatabase);

  router.get('/health', asyncHandler(controller.getHealth));

  return router;
};

export default createHealthRouter;
