import { spawn } from 'child_process';
import { ArtifactReference, DeploymentReference } from '../models/Artifact.js';
import { DeployAction, PublishAction, ShellAction, StageAction, StageSpec, VerifyAction } from '../models/Pipeline.js';
import { RunContext } from '../models/Run.js';
import { StageOutput } from '../models/Stage.js';
import { ArtifactRegistry } from './artifact-registry.service.js';
import { DeploymentPlatform } from './deployment-platform.service.js';
import { HealthGateService } from './health-gate.service.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface ActionContext {
  runId: string;
  pipeline: string;
  stage: StageSpec;
  attempt: number;
  run: RunContext;
  /** Declared outputs of the stages that already succeeded in this run. */
  upstream: ReadonlyMap<string, StageOutput>;
  /** Aborted when the attempt times out or the run is cancelled. */
  signal: AbortSignal;
}

export type ActionResult =
  | { ok: true; output?: string; exitCode?: number; result?: StageOutput }
  | { ok: false; error: string; output?: string; exitCode?: number; signal?: string };

export type ActionHandler<A extends StageAction> = (action: A, context: ActionContext) => Promise<ActionResult>;

export interface StageActionHandlers {
  shell: ActionHandler<ShellAction>;
  publish: ActionHandler<PublishAction>;
  deploy: ActionHandler<DeployAction>;
  verify: ActionHandler<VerifyAction>;
}

const logger = createLogger('StageActions');

/** Characters of output kept per attempt; later output is dropped. */
const MAX_CAPTURED_CHARS = 10 * 1024 * 1024;

/** Kills the command and everything it started: the child leads its own process group. */
function killProcessGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group already exited
    if (!(error instanceof Error && 'code' in error && error.code === 'ESRCH')) {
      logger.error(`Could not kill process group ${pid}: ${errorMessage(error)}`);
    }
  }
}

export const runShellAction: ActionHandler<ShellAction> = (action, context) =>
  new Promise(resolve => {
    let output = '';
    const capture = (chunk: string) => {
      if (output.length < MAX_CAPTURED_CHARS) {
        output += chunk;
      }
    };

    const child = spawn('sh', ['-c', action.command], {
      cwd: action.cwd,
      env: {
        ...process.env,
        ...action.environment,
        CONVEYOR_RUN_ID: context.runId,
        CONVEYOR_PIPELINE: context.pipeline,
        CONVEYOR_STAGE: context.stage.name,
        CONVEYOR_ATTEMPT: String(context.attempt),
        ...(context.run.commit ? { CONVEYOR_COMMIT: context.run.commit } : {}),
        ...(context.run.version ? { CONVEYOR_VERSION: context.run.version } : {})
      },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true
    });

    const kill = () => killProcessGroup(child.pid);
    context.signal.addEventListener('abort', kill, { once: true });
    if (context.signal.aborted) kill();

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', capture);
    child.stderr.on('data', capture);

    child.on('error', error => {
      context.signal.removeEventListener('abort', kill);
      resolve({ ok: false, error: `Failed to start command: ${error.message}`, output });
    });

    child.on('close', (code, signal) => {
      context.signal.removeEventListener('abort', kill);
      if (code === 0) {
        resolve({ ok: true, output, exitCode: 0 });
        return;
      }
      resolve({
        ok: false,
        output,
        exitCode: code ?? undefined,
        signal: signal ?? undefined,
        error: `Command failed with exit code ${code}${signal ? ` (signal: ${signal})` : ''}`
      });
    });
  });

export function createPublishAction(registry: ArtifactRegistry): ActionHandler<PublishAction> {
  return async (action, context) => {
    const version = context.run.version || context.run.commit || context.runId;
    const published = await registry.publish(action.artifact, version, action.payload, { signal: context.signal });
    if (published.status === 'rejected') {
      return { ok: false, error: `Registry rejected ${action.artifact}@${version}: ${published.reason}` };
    }
    const artifact: ArtifactReference = { id: action.artifact, version, location: published.location };
    return {
      ok: true,
      output: `Published ${action.artifact}@${version}${published.location ? ` to ${published.location}` : ''}`,
      result: { artifact }
    };
  };
}

/** The artifact a deploy stage ships: the run's input artifact, else one published earlier in the same run. */
function artifactToDeploy(context: ActionContext): ArtifactReference | undefined {
  if (context.run.artifact) {
    return context.run.artifact;
  }
  for (const output of context.upstream.values()) {
    if (output.artifact) {
      return output.artifact;
    }
  }
  return undefined;
}

export function createDeployAction(platform: DeploymentPlatform, healthGate: HealthGateService): ActionHandler<DeployAction> {
  return async (action, context) => {
    const artifact = artifactToDeploy(context);
    const image = action.workload.image ?? (artifact ? `${artifact.id}:${artifact.version}` : undefined);
    if (!image) {
      return { ok: false, error: `No artifact to deploy for workload ${action.workload.name}` };
    }

    const applied = await platform.apply({ ...action.workload, image }, { signal: context.signal });
    if (applied.status === 'rejected') {
      return { ok: false, error: `Platform rejected workload ${action.workload.name}: ${applied.reason}` };
    }

    const deployment: DeploymentReference = {
      selector: action.selector ?? action.workload.name,
      workload: action.workload.name,
      revision: applied.revision
    };
    const lines = [`Applied ${action.workload.name} with image ${image}${applied.revision ? ` (revision ${applied.revision})` : ''}`];

    if (action.healthCheck) {
      const policy = healthGate.resolvePolicy(deployment.selector, action.healthCheck);
      const health = await healthGate.verify(policy, deployment, context.signal);
      lines.push(`Health check ${health.status} after ${health.polls} polls: ${health.diagnostic ?? 'no diagnostic'}`);
      if (health.status === 'unhealthy') {
        return { ok: false, error: `Deployment ${deployment.workload} unhealthy: ${health.diagnostic ?? 'no healthy polls'}`, output: lines.join('\n') };
      }
    }

    return { ok: true, output: lines.join('\n'), result: { deployment } };
  };
}

export function createVerifyAction(healthGate: HealthGateService): ActionHandler<VerifyAction> {
  return async (action, context) => {
    let deployment: DeploymentReference | undefined;
    for (const output of context.upstream.values()) {
      if (output.deployment && (!action.selector || output.deployment.selector === action.selector)) {
        deployment = output.deployment;
      }
    }
    const selector = action.selector ?? deployment?.selector;
    if (!selector) {
      return { ok: false, error: 'No deployment to verify: set a selector or depend on a deploy stage' };
    }

    const policy = healthGate.resolvePolicy(selector, action.healthCheck);
    const health = await healthGate.verify(policy, deployment, context.signal);
    const output = `Health check ${health.status} after ${health.polls} polls in ${health.elapsedMs}ms: ${health.diagnostic ?? 'no diagnostic'}`;
    if (health.status === 'unhealthy') {
      return { ok: false, error: `Deployment ${selector} unhealthy: ${health.diagnostic ?? 'no healthy polls'}`, output };
    }
    return { ok: true, output, result: deployment ? { deployment } : undefined };
  };
}

export interface ActionCollaborators {
  registry: ArtifactRegistry;
  platform: DeploymentPlatform;
  healthGate: HealthGateService;
}

export function createStageActionHandlers(
  collaborators: ActionCollaborators,
  overrides: Partial<StageActionHandlers> = {}
): StageActionHandlers {
  return {
    shell: runShellAction,
    publish: createPublishAction(collaborators.registry),
    deploy: createDeployAction(collaborators.platform, collaborators.healthGate),
    verify: createVerifyAction(collaborators.healthGate),
    ...overrides
  };
}
