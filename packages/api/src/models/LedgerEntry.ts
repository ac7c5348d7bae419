import { PipelineKind } from './Pipeline.js';
import { RunContext, RunOutcome } from './Run.js';
import { Stage } from './Stage.js';

/** Immutable snapshot of a terminal run. */
export interface LedgerEntry {
  readonly runId: string;
  readonly pipeline: string;
  readonly pipelineVersion: string;
  readonly kind: PipelineKind;
  readonly context: RunContext;
  readonly outcome: RunOutcome;
  readonly stages: readonly Stage[];
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly error?: string;
}

export interface LedgerFilter {
  runId?: string;
  pipeline?: string;
  outcome?: RunOutcome;
  /** Inclusive lower bound on completion time. */
  from?: Date;
  /** Inclusive upper bound on completion time. */
  to?: Date;
  limit?: number;
}
