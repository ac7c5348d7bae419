import { StageAction, StageSpec } from '../models/Pipeline.js';
import { RunContext } from '../models/Run.js';
import { AttemptStatus, StageAttempt, StageOutput } from '../models/Stage.js';
import { Clock, systemClock } from '../utils/clock.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { RunStorageService } from './run-storage.service.js';
import { ActionContext, ActionResult, StageActionHandlers } from './stage-actions.js';

export interface StageExecutionContext {
  runId: string;
  pipeline: string;
  run: RunContext;
  upstream: ReadonlyMap<string, StageOutput>;
  /** The run's cancellation signal. */
  signal: AbortSignal;
}

export interface StageResult {
  status: AttemptStatus;
  attempts: StageAttempt[];
  startedAt: Date;
  completedAt: Date;
  exitCode?: number;
  signal?: string;
  output?: string;
  outputRef?: string;
  error?: string;
  result?: StageOutput;
}

export interface RetryBackoff {
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_BACKOFF: RetryBackoff = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000
};

export interface StageExecutorOptions {
  clock?: Clock;
  backoff?: RetryBackoff;
  /** Where full attempt output is written; without it only the tail is kept inline. */
  storage?: RunStorageService;
}

/** Inline output kept on a stage record; the stored log has everything. */
const OUTPUT_TAIL_CHARS = 4000;

type AttemptOutcome =
  | { kind: 'done'; result: ActionResult }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

/** Delay before retry number `retry` (1-based): base doubling per retry, capped. */
export function backoffDelay(retry: number, backoff: RetryBackoff): number {
  return Math.min(backoff.baseDelayMs * 2 ** (retry - 1), backoff.maxDelayMs);
}

function whenAborted(signal: AbortSignal): { promise: Promise<AttemptOutcome>; dispose: () => void } {
  let listener: (() => void) | undefined;
  const promise = new Promise<AttemptOutcome>(resolve => {
    if (signal.aborted) {
      resolve({ kind: 'cancelled' });
      return;
    }
    listener = () => resolve({ kind: 'cancelled' });
    signal.addEventListener('abort', listener, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    }
  };
}

const tail = (text: string | undefined): string | undefined =>
  text === undefined || text.length <= OUTPUT_TAIL_CHARS ? text : text.slice(-OUTPUT_TAIL_CHARS);

const logger = createLogger('StageExecutor');

/**
 * Runs one stage to a result: each attempt under the stage timeout, failed or
 * timed-out attempts retried with backoff. Never touches run state; the
 * coordinator applies the returned result.
 */
export class StageExecutorService {
  private clock: Clock;
  private backoff: RetryBackoff;
  private storage?: RunStorageService;

  constructor(private handlers: StageActionHandlers, options: StageExecutorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.backoff = options.backoff ?? DEFAULT_RETRY_BACKOFF;
    this.storage = options.storage;
  }

  async execute(spec: StageSpec, context: StageExecutionContext): Promise<StageResult> {
    const attempts: StageAttempt[] = [];
    const maxAttempts = spec.retries + 1;
    let result: StageOutput | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { record, output } = await this.runAttempt(spec, context, attempt);
      attempts.push(record);
      result = output;

      const retryable = record.status === 'failed' || record.status === 'timed_out';
      if (!retryable || attempt === maxAttempts || context.signal.aborted) {
        break;
      }

      const delay = backoffDelay(attempt, this.backoff);
      logger.warn(`${context.runId}/${spec.name} attempt ${attempt}/${maxAttempts} ${record.status}, retrying in ${delay}ms`);
      await this.clock.sleep(delay, context.signal);
      if (context.signal.aborted) {
        break;
      }
    }

    const last = attempts[attempts.length - 1];
    return {
      status: last.status,
      attempts,
      startedAt: attempts[0].startedAt,
      completedAt: last.completedAt,
      exitCode: last.exitCode,
      signal: last.signal,
      output: last.output,
      outputRef: last.outputRef,
      error: last.error,
      result
    };
  }

  private async runAttempt(
    spec: StageSpec,
    context: StageExecutionContext,
    attempt: number
  ): Promise<{ record: StageAttempt; output?: StageOutput }> {
    const startedAt = this.clock.now();
    if (context.signal.aborted) {
      return { record: { attempt, status: 'cancelled', startedAt, completedAt: startedAt, error: 'Run cancelled before the stage started' } };
    }

    const actionController = new AbortController();
    const timerController = new AbortController();
    const cancellation = whenAborted(context.signal);
    const actionContext: ActionContext = {
      runId: context.runId,
      pipeline: context.pipeline,
      stage: spec,
      attempt,
      run: context.run,
      upstream: context.upstream,
      signal: actionController.signal
    };

    const action = this.dispatch(spec.action, actionContext).then(
      (result): AttemptOutcome => ({ kind: 'done', result }),
      (error: unknown): AttemptOutcome => ({ kind: 'done', result: { ok: false, error: errorMessage(error) } })
    );
    const timeout = this.clock.sleep(spec.timeoutMs, timerController.signal).then((): AttemptOutcome => ({ kind: 'timeout' }));

    const outcome = await Promise.race([action, timeout, cancellation.promise]);
    timerController.abort();
    cancellation.dispose();
    if (outcome.kind !== 'done') {
      actionController.abort();
    }

    const completedAt = this.clock.now();
    switch (outcome.kind) {
      case 'timeout':
        logger.warn(`${context.runId}/${spec.name} attempt ${attempt} timed out after ${spec.timeoutMs}ms`);
        return { record: { attempt, status: 'timed_out', startedAt, completedAt, error: `Stage exceeded its timeout of ${spec.timeoutMs}ms` } };
      case 'cancelled':
        return { record: { attempt, status: 'cancelled', startedAt, completedAt, error: 'Run cancelled' } };
      case 'done': {
        const { result } = outcome;
        const outputRef = this.storeOutput(context.runId, spec.name, attempt, result.output);
        if (result.ok) {
          return {
            record: { attempt, status: 'succeeded', startedAt, completedAt, exitCode: result.exitCode, output: tail(result.output), outputRef },
            output: result.result
          };
        }
        return {
          record: {
            attempt,
            status: 'failed',
            startedAt,
            completedAt,
            exitCode: result.exitCode,
            signal: result.signal,
            output: tail(result.output),
            outputRef,
            error: result.error
          }
        };
      }
    }
  }

  private storeOutput(runId: string, stage: string, attempt: number, output: string | undefined): string | undefined {
    if (!this.storage || !output) {
      return undefined;
    }
    try {
      return this.storage.storeStageOutput(runId, stage, attempt, output);
    } catch (error) {
      logger.error(`Failed to store output of ${runId}/${stage} attempt ${attempt}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private dispatch(action: StageAction, context: ActionContext): Promise<ActionResult> {
    switch (action.kind) {
      case 'shell':
        return this.handlers.shell(action, context);
      case 'publish':
        return this.handlers.publish(action, context);
      case 'deploy':
        return this.handlers.deploy(action, context);
      case 'verify':
        return this.handlers.verify(action, context);
    }
  }
}
