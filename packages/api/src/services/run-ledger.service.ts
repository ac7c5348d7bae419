import { LedgerEntry, LedgerFilter } from '../models/LedgerEntry.js';
import { Run } from '../models/Run.js';
import { Stage } from '../models/Stage.js';
import { LedgerConflictError, ValidationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { createLogger } from '../utils/logger.js';
import { LedgerStore } from './ledger-store.js';

const logger = createLogger('RunLedger');

function snapshotStage(stage: Stage): Stage {
  return structuredClone(stage);
}

/**
 * Append-only record of terminal runs. Performs no business logic beyond
 * refusing to rewrite history.
 */
export class RunLedgerService {
  constructor(private store: LedgerStore) {}

  /**
   * Records a terminal run. Recording the same run again with the same
   * outcome returns the existing entry; a different outcome is a conflict.
   */
  record(run: Run): LedgerEntry {
    if (!run.outcome || !run.completedAt) {
      throw new ValidationError(`Run ${run.id} is not terminal (state: ${run.state})`);
    }
    const unsettled = [...run.stages.values()].filter(stage => stage.state === 'pending' || stage.state === 'running');
    if (unsettled.length > 0) {
      throw new ValidationError(`Run ${run.id} has unsettled stages: ${unsettled.map(stage => `${stage.name}=${stage.state}`).join(', ')}`);
    }

    const existing = this.store.get(run.id);
    if (existing) {
      if (existing.outcome !== run.outcome) {
        logger.error(`Conflicting outcome for run ${run.id}: recorded ${existing.outcome}, got ${run.outcome}`);
        throw new LedgerConflictError(run.id, existing.outcome, run.outcome);
      }
      logger.debug(`Run ${run.id} already recorded as ${existing.outcome}`);
      return existing;
    }

    const entry: LedgerEntry = deepFreeze({
      runId: run.id,
      pipeline: run.pipeline,
      pipelineVersion: run.pipelineVersion,
      kind: run.kind,
      context: structuredClone(run.context),
      outcome: run.outcome,
      stages: [...run.stages.values()].map(snapshotStage),
      startedAt: new Date(run.startedAt),
      completedAt: new Date(run.completedAt),
      error: run.error
    });
    this.store.insert(entry);
    logger.info(`Recorded run ${run.id} (${run.pipeline}@${run.pipelineVersion}) as ${run.outcome}`);
    return entry;
  }

  get(runId: string): LedgerEntry | undefined {
    return this.store.get(runId);
  }

  query(filter: LedgerFilter = {}): LedgerEntry[] {
    return this.store.query(filter);
  }
}
