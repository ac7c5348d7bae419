import { Router } from 'express';
import { PipelineController } from '../controllers/pipeline.controller.js';
import { validateSchema } from '../middleware/validation.js';
import { startRunSchema } from '../schemas/run.schemas.js';
import { Services } from '../services/index.js';

export function createPipelineRouter(services: Services): Router {
  const router = Router();
  const controller = new PipelineController(services.definitions, services.coordinator);

  router.get('/', controller.listPipelines);
  router.get('/:name', controller.getPipeline);
  router.post<'/:name/runs'>('/:name/runs', validateSchema(startRunSchema), controller.startRun);

  return router;
}
