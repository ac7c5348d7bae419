import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { RunCoordinatorService } from '../services/run-coordinator.service.js';
import { RunStorageService } from '../services/run-storage.service.js';
import { StatusService } from '../services/status.service.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

interface RouteParams {
  id: string;
}

interface OutputRouteParams extends RouteParams {
  stage: string;
}

const outputQuerySchema = z.object({
  attempt: z.coerce.number().int().positive().optional()
});

const listQuerySchema = z.object({
  pipeline: z.string().min(1).optional(),
  outcome: z.enum(['succeeded', 'failed', 'cancelled']).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  limit: z.coerce.number().int().positive().max(500).default(50)
});

export class RunController {
  constructor(
    private status: StatusService,
    private coordinator: RunCoordinatorService,
    private storage: RunStorageService
  ) {}

  listRuns = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const parsed = listQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(`${issue.path.join('.')}: ${issue.message}`);
      }
      const { pipeline, outcome, from, to, limit } = parsed.data;
      if (from && to && from > to) {
        throw new ValidationError('from must not be later than to');
      }
      res.json({
        runs: this.status.listRuns(pipeline, { from, to }, { outcome, limit }),
        active: this.status.listActiveRuns(pipeline)
      });
    } catch (error) {
      next(error);
    }
  };

  getRun = (req: Request<RouteParams>, res: Response, next: NextFunction): void => {
    try {
      res.json(this.status.getRun(req.params.id));
    } catch (error) {
      next(error);
    }
  };

  /** Full stored output of one attempt, the last one unless `attempt` is given. */
  getStageOutput = (req: Request<OutputRouteParams>, res: Response, next: NextFunction): void => {
    try {
      const parsed = outputQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(`${issue.path.join('.')}: ${issue.message}`);
      }
      const view = this.status.getRun(req.params.id);
      const stage = view.stages.find(candidate => candidate.name === req.params.stage);
      if (!stage) {
        throw new NotFoundError(`Stage ${req.params.stage} not found in run ${view.runId}`);
      }
      const attempt = parsed.data.attempt ?? stage.attempts;
      const output = attempt > 0 ? this.storage.readStageOutput(view.runId, stage.name, attempt) : undefined;
      if (output === undefined) {
        throw new NotFoundError(`No output stored for ${stage.name} attempt ${attempt} of run ${view.runId}`);
      }
      res.type('text/plain').send(output);
    } catch (error) {
      next(error);
    }
  };

  cancelRun = (req: Request<RouteParams>, res: Response, next: NextFunction): void => {
    try {
      const view = this.status.getRun(req.params.id);
      const cancelled = this.coordinator.cancel({ runId: view.runId, pipeline: view.pipeline });
      res.status(cancelled ? 202 : 200).json({ runId: view.runId, cancelled });
    } catch (error) {
      next(error);
    }
  };
}
