import { ArtifactReference, DeploymentReference } from '../models/Artifact.js';
import { LedgerEntry } from '../models/LedgerEntry.js';
import { PipelineKind } from '../models/Pipeline.js';
import { Run, RunContext, RunOutcome, RunState } from '../models/Run.js';
import { Stage, StageAttempt, StageState } from '../models/Stage.js';
import { TimeWindow } from '../models/types/index.js';
import { NotFoundError } from '../utils/errors.js';
import { RunCoordinatorService } from './run-coordinator.service.js';
import { RunLedgerService } from './run-ledger.service.js';
import { TriggerBridgeService, TriggerRecord } from './trigger-bridge.service.js';

export interface StageView {
  name: string;
  classification: Stage['classification'];
  state: StageState;
  attempts: number;
  history: StageAttempt[];
  startedAt?: Date;
  completedAt?: Date;
  exitCode?: number;
  error?: string;
  skipReason?: string;
  output?: string;
  outputRef?: string;
  artifact?: ArtifactReference;
  deployment?: DeploymentReference;
}

export interface RunView {
  runId: string;
  pipeline: string;
  pipelineVersion: string;
  kind: PipelineKind;
  state: RunState;
  outcome?: RunOutcome;
  context: RunContext;
  startedAt: Date;
  completedAt?: Date;
  error?: string;
  stages: StageView[];
  trigger?: TriggerRecord;
}

export interface ListRunsOptions {
  outcome?: RunOutcome;
  limit?: number;
}

const toStageView = (stage: Stage): StageView => ({
  name: stage.name,
  classification: stage.classification,
  state: stage.state,
  attempts: stage.attempts,
  history: stage.history,
  startedAt: stage.startedAt,
  completedAt: stage.completedAt,
  exitCode: stage.exitCode,
  error: stage.error,
  skipReason: stage.skipReason,
  output: stage.output,
  outputRef: stage.outputRef,
  artifact: stage.result?.artifact,
  deployment: stage.result?.deployment
});

/**
 * Read side for operators: finished runs come from the ledger, runs still in
 * flight from the coordinator.
 */
export class StatusService {
  constructor(
    private ledger: RunLedgerService,
    private coordinator: RunCoordinatorService,
    private bridge?: TriggerBridgeService
  ) {}

  getRun(runId: string): RunView {
    const entry = this.ledger.get(runId);
    if (entry) {
      return this.fromEntry(entry);
    }
    const run = this.coordinator.getActiveRun(runId);
    if (run) {
      return this.fromRun(run);
    }
    throw new NotFoundError(`Run ${runId} not found`);
  }

  listRuns(pipeline: string | undefined, window: TimeWindow = {}, options: ListRunsOptions = {}): LedgerEntry[] {
    return this.ledger.query({ pipeline, from: window.from, to: window.to, outcome: options.outcome, limit: options.limit });
  }

  listActiveRuns(pipeline?: string): RunView[] {
    return this.coordinator
      .listActiveRuns()
      .filter(run => !pipeline || run.pipeline === pipeline)
      .map(run => this.fromRun(run));
  }

  private fromEntry(entry: LedgerEntry): RunView {
    return {
      runId: entry.runId,
      pipeline: entry.pipeline,
      pipelineVersion: entry.pipelineVersion,
      kind: entry.kind,
      state: entry.outcome,
      outcome: entry.outcome,
      context: entry.context,
      startedAt: entry.startedAt,
      completedAt: entry.completedAt,
      error: entry.error,
      stages: entry.stages.map(toStageView),
      trigger: this.bridge?.getTrigger(entry.runId)
    };
  }

  private fromRun(run: Run): RunView {
    return {
      runId: run.id,
      pipeline: run.pipeline,
      pipelineVersion: run.pipelineVersion,
      kind: run.kind,
      state: run.state,
      outcome: run.outcome,
      context: run.context,
      startedAt: run.startedAt,
      completedAt: run.completedAt,
      error: run.error,
      stages: [...run.stages.values()].map(toStageView)
    };
  }
}
