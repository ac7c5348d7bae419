import { Router } from 'express';
import { RunController } from '../controllers/run.controller.js';
import { Services } from '../services/index.js';

export function createRunRouter(services: Services): Router {
  const router = Router();
  const controller = new RunController(services.status, services.coordinator, services.storage);

  router.get('/', controller.listRuns);
  router.get('/:id', controller.getRun);
  router.get('/:id/stages/:stage/output', controller.getStageOutput);
  router.post('/:id/cancel', controller.cancelRun);

  return router;
}
