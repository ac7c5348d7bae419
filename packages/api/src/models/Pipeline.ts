export type StageClassification = 'build' | 'test' | 'security' | 'publish' | 'deploy' | 'verify';

export type PipelineKind = 'ci' | 'cd';

export interface HealthCheckPolicy {
  /** Workload selector passed to the platform's status call. */
  selector: string;
  intervalMs: number;
  maxAttempts: number;
  /** Consecutive healthy polls required before the workload counts as healthy. */
  successThreshold: number;
  /** Wall-clock bound; defaults to intervalMs × maxAttempts. */
  deadlineMs?: number;
}

export interface WorkloadSpec {
  name: string;
  image?: string;
  replicas: number;
  environment?: Record<string, string>;
}

export interface ShellAction {
  kind: 'shell';
  command: string;
  cwd?: string;
  environment?: Record<string, string>;
}

export interface PublishAction {
  kind: 'publish';
  artifact: string;
  /** Reference to the payload to upload, e.g. a path or an image digest. */
  payload: string;
}

export interface DeployAction {
  kind: 'deploy';
  workload: WorkloadSpec;
  /** Selector the platform reports status under; defaults to the workload name. */
  selector?: string;
  healthCheck?: Partial<HealthCheckPolicy>;
}

export interface VerifyAction {
  kind: 'verify';
  selector?: string;
  healthCheck?: Partial<HealthCheckPolicy>;
}

export type StageAction = ShellAction | PublishAction | DeployAction | VerifyAction;

export interface StageSpec {
  name: string;
  classification: StageClassification;
  action: StageAction;
  dependsOn: string[];
  timeoutMs: number;
  retries: number;
}

export interface PipelineSchedule {
  cron: string;
  timezone?: string;
}

export interface PipelineDefinition {
  name: string;
  version: string;
  kind: PipelineKind;
  description?: string;
  stages: StageSpec[];
  /** Pipeline started with this run's artifact once a ci run succeeds. */
  downstream?: string;
  schedule?: PipelineSchedule;
}

/**
 * A definition that passed structural validation: stage specs indexed by name
 * and a topological order computed once.
 */
export interface ValidatedPipeline {
  definition: PipelineDefinition;
  stagesByName: ReadonlyMap<string, StageSpec>;
  order: readonly string[];
}
