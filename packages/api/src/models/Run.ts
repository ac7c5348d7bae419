import { ArtifactReference } from './Artifact.js';
import { PipelineKind } from './Pipeline.js';
import { Stage } from './Stage.js';
import { TriggerType } from './types/index.js';

export type RunState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type RunOutcome = 'succeeded' | 'failed' | 'cancelled';

export interface RunContext {
  artifact?: ArtifactReference;
  commit?: string;
  version?: string;
  trigger?: TriggerType;
  /** Id of the upstream run that triggered this one. */
  triggeredBy?: string;
  parameters?: Record<string, string>;
}

export interface Run {
  readonly id: string;
  pipeline: string;
  pipelineVersion: string;
  kind: PipelineKind;
  state: RunState;
  context: RunContext;
  stages: Map<string, Stage>;
  startedAt: Date;
  completedAt?: Date;
  outcome?: RunOutcome;
  error?: string;
}
