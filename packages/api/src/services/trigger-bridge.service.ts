import { EventEmitter } from 'events';
import { PipelineDefinition } from '../models/Pipeline.js';
import { Run, RunContext } from '../models/Run.js';
import { TriggerType } from '../models/types/index.js';
import { AmbiguousArtifactError, ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { RunCoordinatorService, RunHandle } from './run-coordinator.service.js';

export type PipelineLookup = (name: string) => PipelineDefinition | undefined;

export type TriggerRecord =
  | { status: 'triggered'; upstreamRunId: string; downstream: RunHandle }
  | { status: 'failed'; upstreamRunId: string; error: string };

const logger = createLogger('TriggerBridge');

/** Trigger records kept for status queries; the oldest are dropped first. */
export const DEFAULT_MAX_TRIGGER_RECORDS = 1000;

/**
 * Starts the downstream cd run when a ci run succeeds, handing it the artifact
 * the ci run published. The upstream run's recorded outcome is never revisited.
 */
export class TriggerBridgeService extends EventEmitter {
  private records = new Map<string, TriggerRecord>();

  constructor(
    private coordinator: RunCoordinatorService,
    private lookup: PipelineLookup,
    private maxRecords = DEFAULT_MAX_TRIGGER_RECORDS
  ) {
    super();
  }

  /** Subscribes to the coordinator's runCompleted event; returns the unsubscribe function. */
  attach(): () => void {
    return this.coordinator.onRunCompleted(({ run, definition }) => {
      try {
        this.onRunCompleted(run, definition);
      } catch (error) {
        logger.error(`Could not trigger downstream of run ${run.id}: ${errorMessage(error)}`);
        this.emit('triggerFailed', run.id, error);
      }
    });
  }

  /**
   * Returns the downstream run handle, or undefined when the run does not
   * hand off (not a successful ci run, or no downstream configured). Throws
   * AmbiguousArtifactError unless exactly one publish stage succeeded with an
   * artifact.
   */
  onRunCompleted(run: Run, definition?: PipelineDefinition): RunHandle | undefined {
    const previous = this.records.get(run.id);
    if (previous?.status === 'triggered') {
      return previous.downstream;
    }

    if (run.outcome !== 'succeeded' || run.kind !== 'ci') {
      return undefined;
    }
    const upstream = definition ?? this.lookup(run.pipeline);
    if (!upstream?.downstream) {
      logger.debug(`Pipeline ${run.pipeline} has no downstream pipeline`);
      return undefined;
    }

    try {
      const downstream = this.lookup(upstream.downstream);
      if (!downstream) {
        throw new ConfigurationError(`Downstream pipeline ${upstream.downstream} of ${run.pipeline} is not registered`);
      }

      const publishStages = [...run.stages.values()].filter(
        stage => stage.classification === 'publish' && stage.state === 'succeeded'
      );
      const artifact = publishStages.length === 1 ? publishStages[0].result?.artifact : undefined;
      if (!artifact) {
        throw new AmbiguousArtifactError(run.id, publishStages.map(stage => stage.name));
      }

      const context: RunContext = {
        artifact,
        commit: run.context.commit,
        version: artifact.version,
        trigger: TriggerType.Upstream,
        triggeredBy: run.id,
        parameters: run.context.parameters
      };
      const handle = this.coordinator.start(downstream, context);
      this.remember({ status: 'triggered', upstreamRunId: run.id, downstream: handle });
      logger.info(`Run ${run.id} of ${run.pipeline} triggered ${downstream.name} run ${handle.runId} with ${artifact.id}@${artifact.version}`);
      this.emit('triggered', run.id, handle);
      return handle;
    } catch (error) {
      this.remember({ status: 'failed', upstreamRunId: run.id, error: errorMessage(error) });
      throw error;
    }
  }

  private remember(record: TriggerRecord): void {
    this.records.delete(record.upstreamRunId);
    this.records.set(record.upstreamRunId, record);
    for (const oldest of this.records.keys()) {
      if (this.records.size <= this.maxRecords) break;
      this.records.delete(oldest);
    }
  }

  getTrigger(upstreamRunId: string): TriggerRecord | undefined {
    return this.records.get(upstreamRunId);
  }
}
