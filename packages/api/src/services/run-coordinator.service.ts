import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { LedgerEntry } from '../models/LedgerEntry.js';
import { PipelineDefinition, ValidatedPipeline } from '../models/Pipeline.js';
import { Run, RunContext, RunOutcome } from '../models/Run.js';
import { isTerminalStageState, Stage, StageOutput, StageState } from '../models/Stage.js';
import { Clock, systemClock } from '../utils/clock.js';
import { errorMessage, NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { MetricsSink, NullMetricsSink, SinkBatch } from './metrics-sink.service.js';
import { validatePipeline } from './pipeline-definition.service.js';
import { RunLedgerService } from './run-ledger.service.js';
import { StageExecutorService, StageResult } from './stage-executor.service.js';

export interface RunCoordinatorConfig {
  /** Upper bound on stages running at once within one run; 0 means unbounded. */
  maxParallelStages: number;
  /** Start no new stage once one has failed; in-flight stages still finish. */
  failFast: boolean;
}

export const DEFAULT_COORDINATOR_CONFIG: RunCoordinatorConfig = {
  maxParallelStages: 0,
  failFast: false
};

export interface RunHandle {
  readonly runId: string;
  readonly pipeline: string;
}

export interface RunCompletedEvent {
  run: Run;
  definition: PipelineDefinition;
  entry: LedgerEntry;
}

export const RUN_COMPLETED = 'runCompleted';

export interface RunCoordinatorOptions {
  config?: Partial<RunCoordinatorConfig>;
  clock?: Clock;
  metrics?: MetricsSink;
}

interface RunExecution {
  run: Run;
  pipeline: ValidatedPipeline;
  controller: AbortController;
}

interface ActiveRun extends RunExecution {
  done: Promise<RunOutcome>;
}

interface Settled {
  name: string;
  result: StageResult;
}

const STATE_FOR_RESULT: Record<StageResult['status'], StageState> = {
  succeeded: 'succeeded',
  failed: 'failed',
  timed_out: 'timed_out',
  cancelled: 'skipped'
};

const logger = createLogger('RunCoordinator');

/**
 * Turns pipeline definitions into runs and drives them to a terminal outcome.
 * The coordinator is the only writer of run and stage state: executors hand
 * back results, and every transition happens here.
 */
export class RunCoordinatorService extends EventEmitter {
  private active = new Map<string, ActiveRun>();
  private config: RunCoordinatorConfig;
  private clock: Clock;
  private metrics: MetricsSink;

  constructor(
    private executor: StageExecutorService,
    private ledger: RunLedgerService,
    options: RunCoordinatorOptions = {}
  ) {
    super();
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...options.config };
    this.clock = options.clock ?? systemClock;
    this.metrics = options.metrics ?? new NullMetricsSink();
  }

  /**
   * Validates the definition and starts a run of it. Throws
   * DefinitionInvalidError, creating nothing, when the stage graph is malformed.
   */
  start(definition: PipelineDefinition, context: RunContext = {}): RunHandle {
    const pipeline = validatePipeline(definition);
    const startedAt = this.clock.now();

    const stages = new Map<string, Stage>();
    for (const name of pipeline.order) {
      const spec = pipeline.stagesByName.get(name);
      if (!spec) continue;
      stages.set(name, { name, classification: spec.classification, state: 'pending', attempts: 0, history: [] });
    }

    const run: Run = {
      id: uuidv4(),
      pipeline: definition.name,
      pipelineVersion: definition.version,
      kind: definition.kind,
      state: 'pending',
      context: structuredClone(context),
      stages,
      startedAt
    };

    const controller = new AbortController();
    const done = this.drive({ run, pipeline, controller });
    this.active.set(run.id, { run, pipeline, controller, done });
    done.catch((error: unknown) => {
      logger.error(`Run ${run.id} could not be finalized: ${errorMessage(error)}`);
    });

    logger.info(`Started run ${run.id} of ${definition.name}@${definition.version}`, {
      stages: pipeline.order,
      commit: context.commit,
      artifact: context.artifact,
      triggeredBy: context.triggeredBy
    });
    return { runId: run.id, pipeline: definition.name };
  }

  /** Resolves with the run's terminal outcome. */
  async wait(handle: RunHandle): Promise<RunOutcome> {
    const active = this.active.get(handle.runId);
    if (active) {
      return active.done;
    }
    const entry = this.ledger.get(handle.runId);
    if (!entry) {
      throw new NotFoundError(`Run ${handle.runId} not found`);
    }
    return entry.outcome;
  }

  /**
   * Requests cancellation: running stages are aborted and every stage not yet
   * terminal ends Skipped. Returns false when the run had already finished.
   */
  cancel(handle: RunHandle): boolean {
    const active = this.active.get(handle.runId);
    if (!active) {
      if (this.ledger.get(handle.runId)) {
        return false;
      }
      throw new NotFoundError(`Run ${handle.runId} not found`);
    }
    if (!active.controller.signal.aborted) {
      logger.warn(`Cancelling run ${handle.runId}`);
      active.controller.abort();
    }
    return true;
  }

  /** Cancels every in-flight run and waits until each is recorded. */
  async cancelAll(): Promise<void> {
    const runs = [...this.active.values()];
    if (runs.length > 0) {
      logger.warn(`Cancelling ${runs.length} in-flight runs`);
    }
    for (const active of runs) {
      active.controller.abort();
    }
    await Promise.allSettled(runs.map(active => active.done));
  }

  /** Point-in-time copy of a run that has not finished yet. */
  getActiveRun(runId: string): Run | undefined {
    const active = this.active.get(runId);
    return active ? structuredClone(active.run) : undefined;
  }

  listActiveRuns(): Run[] {
    return [...this.active.values()].map(active => structuredClone(active.run));
  }

  onRunCompleted(listener: (event: RunCompletedEvent) => void): () => void {
    this.on(RUN_COMPLETED, listener);
    return () => this.off(RUN_COMPLETED, listener);
  }

  private async drive(active: RunExecution): Promise<RunOutcome> {
    const { run, controller } = active;
    const inFlight = new Map<string, Promise<Settled>>();
    let stageFailed = false;

    run.state = 'running';
    try {
      for (;;) {
        if (!controller.signal.aborted) {
          this.skipBlockedStages(active);
          if (this.config.failFast && stageFailed) {
            this.skipPendingStages(run, 'an earlier stage failed');
          } else {
            this.launchRunnableStages(active, inFlight);
          }
        }

        if (inFlight.size === 0) {
          break;
        }

        const { name, result } = await Promise.race(inFlight.values());
        inFlight.delete(name);
        this.applyResult(active, name, result);
        if (result.status === 'failed' || result.status === 'timed_out') {
          stageFailed = true;
        }
      }
    } catch (error) {
      run.error = `Run coordination failed: ${errorMessage(error)}`;
      logger.error(`Run ${run.id} coordination failed`, error);
      controller.abort();
      const remaining = await Promise.allSettled(inFlight.values());
      for (const settled of remaining) {
        if (settled.status === 'fulfilled') {
          this.applyResult(active, settled.value.name, settled.value.result);
        }
      }
    }

    const cancelled = controller.signal.aborted && run.error === undefined;
    this.skipPendingStages(run, cancelled ? 'run cancelled' : 'run failed');
    const allSucceeded = [...run.stages.values()].every(stage => stage.state === 'succeeded');
    const outcome: RunOutcome = cancelled ? 'cancelled' : allSucceeded && run.error === undefined ? 'succeeded' : 'failed';

    run.state = outcome;
    run.outcome = outcome;
    run.completedAt = this.clock.now();

    try {
      const entry = this.ledger.record(run);
      this.reportRun(run);
      this.emitCompleted({ run: structuredClone(run), definition: active.pipeline.definition, entry });
    } finally {
      this.active.delete(run.id);
    }

    logger.info(`Run ${run.id} of ${run.pipeline} finished: ${outcome}`);
    return outcome;
  }

  /** Pending stages with a dependency that ended without success become Skipped (topological order carries it forward). */
  private skipBlockedStages(active: RunExecution): void {
    const { run, pipeline } = active;
    for (const name of pipeline.order) {
      const stage = run.stages.get(name);
      const spec = pipeline.stagesByName.get(name);
      if (!stage || !spec || stage.state !== 'pending') continue;

      for (const dependency of spec.dependsOn) {
        const upstream = run.stages.get(dependency);
        if (upstream && isTerminalStageState(upstream.state) && upstream.state !== 'succeeded') {
          this.transitionToSkipped(run, stage, `dependency "${dependency}" ${upstream.state}`);
          break;
        }
      }
    }
  }

  private skipPendingStages(run: Run, reason: string): void {
    for (const stage of run.stages.values()) {
      if (stage.state === 'pending') {
        this.transitionToSkipped(run, stage, reason);
      }
    }
  }

  private transitionToSkipped(run: Run, stage: Stage, reason: string): void {
    stage.state = 'skipped';
    stage.skipReason = reason;
    stage.completedAt = this.clock.now();
    logger.info(`${run.id}/${stage.name} skipped: ${reason}`);
  }

  private launchRunnableStages(active: RunExecution, inFlight: Map<string, Promise<Settled>>): void {
    const { run, pipeline, controller } = active;
    const limit = this.config.maxParallelStages;

    for (const name of pipeline.order) {
      if (limit > 0 && inFlight.size >= limit) break;

      const stage = run.stages.get(name);
      const spec = pipeline.stagesByName.get(name);
      if (!stage || !spec || stage.state !== 'pending') continue;

      const ready = spec.dependsOn.every(dependency => run.stages.get(dependency)?.state === 'succeeded');
      if (!ready) continue;

      stage.state = 'running';
      stage.startedAt = this.clock.now();
      logger.info(`${run.id}/${name} running (${spec.classification}, timeout ${spec.timeoutMs}ms, retries ${spec.retries})`);

      const execution = this.executor
        .execute(spec, {
          runId: run.id,
          pipeline: run.pipeline,
          run: run.context,
          upstream: this.upstreamOutputs(run),
          signal: controller.signal
        })
        .catch((error: unknown): StageResult => {
          const now = this.clock.now();
          return {
            status: 'failed',
            attempts: [{ attempt: 1, status: 'failed', startedAt: now, completedAt: now, error: errorMessage(error) }],
            startedAt: now,
            completedAt: now,
            error: errorMessage(error)
          };
        })
        .then((result): Settled => ({ name, result }));
      inFlight.set(name, execution);
    }
  }

  private upstreamOutputs(run: Run): ReadonlyMap<string, StageOutput> {
    const outputs = new Map<string, StageOutput>();
    for (const stage of run.stages.values()) {
      if (stage.state === 'succeeded' && stage.result) {
        outputs.set(stage.name, stage.result);
      }
    }
    return outputs;
  }

  private applyResult(active: RunExecution, name: string, result: StageResult): void {
    const { run, controller } = active;
    const stage = run.stages.get(name);
    if (!stage) return;

    const cancelled = controller.signal.aborted && result.status !== 'succeeded';
    stage.state = cancelled ? 'skipped' : STATE_FOR_RESULT[result.status];
    stage.attempts = result.attempts.length;
    stage.history = result.attempts;
    stage.completedAt = result.completedAt;
    stage.exitCode = result.exitCode;
    stage.signal = result.signal;
    stage.output = result.output;
    stage.outputRef = result.outputRef;
    stage.error = result.error;
    stage.result = result.result;
    if (cancelled) {
      stage.skipReason = 'run cancelled';
    }

    const line = `${run.id}/${name} ${stage.state} after ${stage.attempts} attempt(s)${stage.error ? `: ${stage.error}` : ''}`;
    if (stage.state === 'succeeded') {
      logger.info(line);
    } else {
      logger.warn(line);
    }
    this.reportStage(run, stage);
  }

  private reportStage(run: Run, stage: Stage): void {
    const timestamp = this.clock.now();
    const labels = { pipeline: run.pipeline, stage: stage.name, state: stage.state, run: run.id };
    const durationMs = stage.startedAt && stage.completedAt ? stage.completedAt.getTime() - stage.startedAt.getTime() : 0;
    this.ingest({
      kind: 'samples',
      samples: [
        { name: 'stage_duration_ms', value: durationMs, timestamp, labels },
        { name: 'stage_attempts', value: stage.attempts, timestamp, labels }
      ]
    });
    this.ingest({
      kind: 'logs',
      lines: [{
        timestamp,
        level: stage.state === 'succeeded' || stage.state === 'skipped' ? 'info' : 'error',
        message: `stage ${stage.name} ${stage.state}${stage.error ? `: ${stage.error}` : ''}`,
        labels
      }]
    });
  }

  private reportRun(run: Run): void {
    const timestamp = this.clock.now();
    const outcome = run.outcome ?? 'failed';
    const labels = { pipeline: run.pipeline, outcome, run: run.id };
    const durationMs = (run.completedAt ?? timestamp).getTime() - run.startedAt.getTime();
    this.ingest({ kind: 'samples', samples: [{ name: 'run_duration_ms', value: durationMs, timestamp, labels }] });
    this.ingest({
      kind: 'logs',
      lines: [{ timestamp, level: outcome === 'succeeded' ? 'info' : 'warn', message: `run ${run.id} ${outcome}`, labels }]
    });
  }

  /** Fire-and-forget: telemetry failures are logged and never affect the run. */
  private ingest(batch: SinkBatch): void {
    this.metrics.ingest(batch).catch((error: unknown) => {
      logger.warn(`Metrics sink rejected a ${batch.kind} batch: ${errorMessage(error)}`);
    });
  }

  private emitCompleted(event: RunCompletedEvent): void {
    try {
      this.emit(RUN_COMPLETED, event);
    } catch (error) {
      logger.error(`A runCompleted listener failed for run ${event.run.id}`, error);
    }
  }
}
