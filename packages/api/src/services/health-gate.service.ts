import { DeploymentReference } from '../models/Artifact.js';
import { HealthCheckPolicy } from '../models/Pipeline.js';
import { Clock, systemClock } from '../utils/clock.js';
import { errorMessage, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { DeploymentPlatform } from './deployment-platform.service.js';

export type HealthStatus = 'healthy' | 'unhealthy';

export interface HealthOutcome {
  status: HealthStatus;
  polls: number;
  consecutiveHealthy: number;
  elapsedMs: number;
  /** Description of the last poll: replica counts, platform error or cancellation. */
  diagnostic?: string;
}

export type HealthCheckDefaults = Omit<HealthCheckPolicy, 'selector' | 'deadlineMs'>;

/** Five-second polls for up to two minutes, two healthy polls in a row. */
export const DEFAULT_HEALTH_CHECK: HealthCheckDefaults = {
  intervalMs: 5000,
  maxAttempts: 24,
  successThreshold: 2
};

interface Observation {
  healthy: boolean;
  diagnostic: string;
}

const logger = createLogger('HealthGate');

const CANCELLED = 'health check cancelled';

export class HealthGateService {
  constructor(
    private platform: DeploymentPlatform,
    private clock: Clock = systemClock,
    private defaults: HealthCheckDefaults = DEFAULT_HEALTH_CHECK
  ) {}

  resolvePolicy(selector: string, overrides: Partial<HealthCheckPolicy> = {}): HealthCheckPolicy {
    const policy: HealthCheckPolicy = {
      selector: overrides.selector ?? selector,
      intervalMs: overrides.intervalMs ?? this.defaults.intervalMs,
      maxAttempts: overrides.maxAttempts ?? this.defaults.maxAttempts,
      successThreshold: overrides.successThreshold ?? this.defaults.successThreshold,
      deadlineMs: overrides.deadlineMs
    };
    const bounded = [policy.intervalMs, policy.maxAttempts, policy.successThreshold, policy.deadlineMs ?? 1]
      .every(value => Number.isFinite(value) && value > 0);
    if (!policy.selector || !bounded) {
      throw new ValidationError(`Health check policy for "${policy.selector}" must have a selector and positive finite bounds`);
    }
    if (policy.successThreshold > policy.maxAttempts) {
      throw new ValidationError(
        `Health check policy for "${policy.selector}" needs ${policy.successThreshold} healthy polls but allows only ${policy.maxAttempts} attempts`
      );
    }
    return policy;
  }

  /**
   * Polls the platform until `successThreshold` consecutive polls are healthy,
   * or until `maxAttempts` polls or the deadline run out. Platform errors and
   * polls still unanswered at the deadline count as unhealthy; this never
   * throws.
   */
  async verify(policy: HealthCheckPolicy, deployment?: DeploymentReference, signal?: AbortSignal): Promise<HealthOutcome> {
    const deadlineMs = policy.deadlineMs ?? policy.intervalMs * policy.maxAttempts;
    const startedAt = this.clock.now().getTime();
    const elapsed = () => this.clock.now().getTime() - startedAt;
    const target = deployment ? `${deployment.workload} (${policy.selector})` : policy.selector;

    let polls = 0;
    let consecutiveHealthy = 0;
    let diagnostic: string | undefined;

    logger.info(`Verifying ${target}: every ${policy.intervalMs}ms, ${policy.successThreshold} consecutive healthy polls within ${policy.maxAttempts} attempts / ${deadlineMs}ms`);

    while (polls < policy.maxAttempts) {
      if (signal?.aborted) {
        diagnostic = CANCELLED;
        break;
      }
      if (polls > 0 && elapsed() >= deadlineMs) {
        break;
      }

      polls++;
      const observation = await this.poll(policy.selector, deadlineMs - elapsed(), signal);
      diagnostic = observation.diagnostic;
      if (signal?.aborted) {
        diagnostic = CANCELLED;
        break;
      }

      if (observation.healthy) {
        consecutiveHealthy++;
        if (consecutiveHealthy >= policy.successThreshold) {
          logger.info(`${target} healthy after ${polls} polls`);
          return { status: 'healthy', polls, consecutiveHealthy, elapsedMs: elapsed(), diagnostic };
        }
      } else {
        consecutiveHealthy = 0;
        logger.debug(`${target} poll ${polls}: ${observation.diagnostic}`);
      }

      const untilDeadline = deadlineMs - elapsed();
      if (polls < policy.maxAttempts && untilDeadline > 0) {
        await this.clock.sleep(Math.min(policy.intervalMs, untilDeadline), signal);
      }
    }

    logger.warn(`${target} unhealthy after ${polls} polls: ${diagnostic ?? 'no polls made'}`);
    return { status: 'unhealthy', polls, consecutiveHealthy, elapsedMs: elapsed(), diagnostic };
  }

  /** One status call, abandoned once `budgetMs` passes or `signal` aborts. */
  private async poll(selector: string, budgetMs: number, signal?: AbortSignal): Promise<Observation> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    signal?.addEventListener('abort', abort, { once: true });

    const answered = this.observe(selector, controller.signal);
    const expired = this.clock.sleep(budgetMs, controller.signal).then(
      (): Observation => ({ healthy: false, diagnostic: `status check timed out after ${budgetMs}ms` })
    );
    try {
      return await Promise.race([answered, expired]);
    } finally {
      signal?.removeEventListener('abort', abort);
      controller.abort();
    }
  }

  private async observe(selector: string, signal: AbortSignal): Promise<Observation> {
    try {
      const status = await this.platform.status(selector, { signal });
      const replicas = `${status.readyReplicas}/${status.desiredReplicas} replicas ready`;
      if (status.lastError) {
        return { healthy: false, diagnostic: `${replicas}: ${status.lastError}` };
      }
      return {
        healthy: status.desiredReplicas > 0 && status.readyReplicas >= status.desiredReplicas,
        diagnostic: replicas
      };
    } catch (error) {
      return { healthy: false, diagnostic: `status check failed: ${errorMessage(error)}` };
    }
  }
}
