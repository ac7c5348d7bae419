import { PipelineDefinition, ShellAction, StageAction, StageClassification, StageSpec, WorkloadSpec } from '../../models/Pipeline.js';
import { ArtifactRegistry, PublishResult } from '../../services/artifact-registry.service.js';
import { ApplyResult, DeploymentPlatform, WorkloadStatus } from '../../services/deployment-platform.service.js';
import { RequestOptions } from '../../utils/http.js';
import { HealthGateService } from '../../services/health-gate.service.js';
import { MetricsSink, SinkBatch } from '../../services/metrics-sink.service.js';
import { ActionContext, ActionHandler, ActionResult, createStageActionHandlers, StageActionHandlers } from '../../services/stage-actions.js';
import { generateJWT } from '../../utils/auth.utils.js';
import { VirtualClock } from '../utils/virtual-clock.js';

export const TEST_SECRET = 'test-secret';

export const createTestToken = (userId = 'operator-1'): string =>
  generateJWT({ userId, email: `${userId}@example.com` }, TEST_SECRET);

export class FakeRegistry implements ArtifactRegistry {
  published: { name: string; version: string; payload: string }[] = [];
  rejectWith?: string;

  async publish(name: string, version: string, payload: string): Promise<PublishResult> {
    if (this.rejectWith) {
      return { status: 'rejected', reason: this.rejectWith };
    }
    this.published.push({ name, version, payload });
    return { status: 'accepted', location: `registry.test/${name}:${version}` };
  }
}

export type StatusScriptEntry = WorkloadStatus | Error | 'hang';

/**
 * Platform that answers status calls from a script, one entry per poll; the
 * last entry repeats. An Error entry makes the call reject; 'hang' never
 * answers and rejects only once the request is aborted.
 */
export class ScriptedPlatform implements DeploymentPlatform {
  applied: WorkloadSpec[] = [];
  statusCalls: string[] = [];
  abortedCalls = 0;
  rejectWith?: string;

  constructor(private script: StatusScriptEntry[] = [{ desiredReplicas: 1, readyReplicas: 1 }]) {}

  async apply(workload: WorkloadSpec): Promise<ApplyResult> {
    if (this.rejectWith) {
      return { status: 'rejected', reason: this.rejectWith };
    }
    this.applied.push(workload);
    return { status: 'accepted', revision: `rev-${this.applied.length}` };
  }

  async status(selector: string, options: RequestOptions = {}): Promise<WorkloadStatus> {
    const index = Math.min(this.statusCalls.length, this.script.length - 1);
    this.statusCalls.push(selector);
    const next = this.script[index];
    if (next === 'hang') {
      return new Promise((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => {
          this.abortedCalls++;
          reject(new Error('request aborted'));
        }, { once: true });
      });
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class RecordingSink implements MetricsSink {
  batches: SinkBatch[] = [];

  async ingest(batch: SinkBatch): Promise<void> {
    this.batches.push(batch);
  }

  sampleNames(): string[] {
    return this.batches.flatMap(batch => (batch.kind === 'samples' ? batch.samples.map(sample => sample.name) : []));
  }
}

export type ShellBehavior = (context: ActionContext, clock: VirtualClock) => Promise<ActionResult>;

export const succeed = (durationMs = 0, output = 'ok'): ShellBehavior =>
  async (_context, clock) => {
    await clock.sleep(durationMs);
    return { ok: true, output, exitCode: 0 };
  };

export const fail = (error = 'Command failed with exit code 1', durationMs = 0): ShellBehavior =>
  async (_context, clock) => {
    await clock.sleep(durationMs);
    return { ok: false, error, exitCode: 1 };
  };

/** Never finishes on its own; settles only once the attempt is aborted. */
export const hang = (): ShellBehavior =>
  context => new Promise(resolve => {
    context.signal.addEventListener('abort', () => resolve({ ok: false, error: 'killed' }), { once: true });
  });

/**
 * Shell handler driven by a per-stage script. An array scripts successive
 * attempts, the last entry repeating; unscripted stages succeed at once.
 */
export class ScriptedShell {
  calls: { stage: string; attempt: number; startedAt: Date }[] = [];
  running = 0;
  maxRunning = 0;

  constructor(
    private clock: VirtualClock,
    private script: Record<string, ShellBehavior | ShellBehavior[]> = {}
  ) {}

  handler: ActionHandler<ShellAction> = async (_action, context) => {
    this.calls.push({ stage: context.stage.name, attempt: context.attempt, startedAt: this.clock.now() });
    const scripted = this.script[context.stage.name];
    const behaviors = scripted === undefined ? [] : Array.isArray(scripted) ? scripted : [scripted];
    const behavior = behaviors[Math.min(context.attempt, behaviors.length) - 1] ?? succeed();

    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    try {
      return await behavior(context, this.clock);
    } finally {
      this.running--;
    }
  };

  attemptsOf(stage: string): number {
    return this.calls.filter(call => call.stage === stage).length;
  }
}

export interface TestCollaborators {
  clock: VirtualClock;
  registry: FakeRegistry;
  platform: ScriptedPlatform;
  healthGate: HealthGateService;
  shell: ScriptedShell;
  handlers: StageActionHandlers;
}

export function createCollaborators(
  script: Record<string, ShellBehavior | ShellBehavior[]> = {},
  platformScript?: StatusScriptEntry[]
): TestCollaborators {
  const clock = new VirtualClock();
  const registry = new FakeRegistry();
  const platform = new ScriptedPlatform(platformScript);
  const healthGate = new HealthGateService(platform, clock);
  const shell = new ScriptedShell(clock, script);
  const handlers = createStageActionHandlers({ registry, platform, healthGate }, { shell: shell.handler });
  return { clock, registry, platform, healthGate, shell, handlers };
}

export const shell = (command = 'true'): ShellAction => ({ kind: 'shell', command });

export function stage(
  name: string,
  options: Partial<Omit<StageSpec, 'name'>> & { action?: StageAction } = {}
): StageSpec {
  const classification: StageClassification = options.classification ?? 'build';
  return {
    name,
    classification,
    action: options.action ?? shell(),
    dependsOn: options.dependsOn ?? [],
    timeoutMs: options.timeoutMs ?? 60_000,
    retries: options.retries ?? 0
  };
}

export function pipeline(name: string, stages: StageSpec[], extra: Partial<PipelineDefinition> = {}): PipelineDefinition {
  return { name, version: '1', kind: 'ci', stages, ...extra };
}

/** build → test, scan (parallel) → publish, handing off to `cdPipeline`. */
export const ciPipeline = (overrides: Partial<Record<'test', Partial<StageSpec>>> = {}): PipelineDefinition =>
  pipeline('app-ci', [
    stage('build', { classification: 'build' }),
    stage('test', { classification: 'test', dependsOn: ['build'], ...overrides.test }),
    stage('scan', { classification: 'security', dependsOn: ['build'] }),
    stage('publish', {
      classification: 'publish',
      dependsOn: ['test', 'scan'],
      action: { kind: 'publish', artifact: 'app', payload: 'dist/app.tar' }
    })
  ], { downstream: 'app-cd' });

export const cdPipeline = (): PipelineDefinition =>
  pipeline('app-cd', [
    stage('deploy', {
      classification: 'deploy',
      action: {
        kind: 'deploy',
        workload: { name: 'app', replicas: 2 },
        healthCheck: { intervalMs: 1000, maxAttempts: 10, successThreshold: 2 }
      }
    }),
    stage('verify', {
      classification: 'verify',
      dependsOn: ['deploy'],
      action: { kind: 'verify', healthCheck: { intervalMs: 1000, maxAttempts: 3, successThreshold: 1 } }
    })
  ], { kind: 'cd' });
