import { StageClassification } from './Pipeline.js';
import { ArtifactReference, DeploymentReference } from './Artifact.js';

export type StageState = 'pending' | 'running' | 'succeeded' | 'failed' | 'timed_out' | 'skipped';

export type AttemptStatus = 'succeeded' | 'failed' | 'timed_out' | 'cancelled';

export const TERMINAL_STAGE_STATES: readonly StageState[] = ['succeeded', 'failed', 'timed_out', 'skipped'];

export const isTerminalStageState = (state: StageState): boolean => TERMINAL_STAGE_STATES.includes(state);

export interface StageAttempt {
  attempt: number;
  status: AttemptStatus;
  startedAt: Date;
  completedAt: Date;
  exitCode?: number;
  signal?: string;
  output?: string;
  outputRef?: string;
  error?: string;
}

/** Declared output of a successful stage. */
export interface StageOutput {
  artifact?: ArtifactReference;
  deployment?: DeploymentReference;
}

export interface Stage {
  name: string;
  classification: StageClassification;
  state: StageState;
  attempts: number;
  history: StageAttempt[];
  startedAt?: Date;
  completedAt?: Date;
  exitCode?: number;
  signal?: string;
  output?: string;
  outputRef?: string;
  error?: string;
  result?: StageOutput;
  skipReason?: string;
}
