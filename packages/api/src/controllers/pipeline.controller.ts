import type { NextFunction, Request, Response } from 'express';
import { ArtifactReference } from '../models/Artifact.js';
import { PipelineDefinition } from '../models/Pipeline.js';
import { RunContext } from '../models/Run.js';
import { TriggerType } from '../models/types/index.js';
import { PipelineDefinitionService } from '../services/pipeline-definition.service.js';
import { RunCoordinatorService } from '../services/run-coordinator.service.js';

interface RouteParams {
  name: string;
}

/** Body shape enforced by `startRunSchema` before the handler runs. */
interface StartRunBody {
  commit?: string;
  version?: string;
  parameters?: Record<string, string>;
  artifact?: ArtifactReference;
}

const summarize = (definition: PipelineDefinition) => ({
  name: definition.name,
  version: definition.version,
  kind: definition.kind,
  description: definition.description,
  downstream: definition.downstream,
  schedule: definition.schedule,
  stages: definition.stages.map(stage => ({
    name: stage.name,
    classification: stage.classification,
    action: stage.action.kind,
    dependsOn: stage.dependsOn,
    timeoutMs: stage.timeoutMs,
    retries: stage.retries
  }))
});

export class PipelineController {
  constructor(
    private definitions: PipelineDefinitionService,
    private coordinator: RunCoordinatorService
  ) {}

  listPipelines = (_req: Request, res: Response): void => {
    res.json({ pipelines: this.definitions.list().map(summarize) });
  };

  getPipeline = (req: Request<RouteParams>, res: Response, next: NextFunction): void => {
    try {
      res.json(summarize(this.definitions.get(req.params.name)));
    } catch (error) {
      next(error);
    }
  };

  startRun = (req: Request<RouteParams, unknown, StartRunBody>, res: Response, next: NextFunction): void => {
    try {
      const definition = this.definitions.get(req.params.name);
      const body = req.body ?? {};
      const context: RunContext = {
        commit: body.commit,
        version: body.version,
        artifact: body.artifact,
        parameters: body.parameters,
        trigger: TriggerType.Manual
      };
      const handle = this.coordinator.start(definition, context);
      res.status(202).json({ runId: handle.runId, pipeline: handle.pipeline });
    } catch (error) {
      next(error);
    }
  };
}
