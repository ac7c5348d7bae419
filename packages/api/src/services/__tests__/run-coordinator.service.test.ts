import { RunCompletedEvent, RunCoordinatorConfig, RunCoordinatorService } from '../run-coordinator.service.js';
import { MemoryLedgerStore } from '../ledger-store.js';
import { RunLedgerService } from '../run-ledger.service.js';
import { StageExecutorService } from '../stage-executor.service.js';
import { LedgerEntry } from '../../models/LedgerEntry.js';
import { DefinitionInvalidError, NotFoundError } from '../../utils/errors.js';
import {
  ciPipeline,
  createCollaborators,
  fail,
  hang,
  pipeline,
  RecordingSink,
  ShellBehavior,
  stage,
  succeed,
  TestCollaborators
} from '../../test/fixtures/engine.js';

describe('RunCoordinatorService', () => {
  let collaborators: TestCollaborators;
  let ledger: RunLedgerService;
  let sink: RecordingSink;
  let coordinator: RunCoordinatorService;

  const setup = (script: Record<string, ShellBehavior | ShellBehavior[]> = {}, config: Partial<RunCoordinatorConfig> = {}) => {
    collaborators = createCollaborators(script);
    const executor = new StageExecutorService(collaborators.handlers, {
      clock: collaborators.clock,
      backoff: { baseDelayMs: 1000, maxDelayMs: 30_000 }
    });
    ledger = new RunLedgerService(new MemoryLedgerStore());
    sink = new RecordingSink();
    coordinator = new RunCoordinatorService(executor, ledger, { config, clock: collaborators.clock, metrics: sink });
  };

  const recorded = (runId: string): LedgerEntry => {
    const entry = ledger.get(runId);
    if (!entry) {
      throw new Error(`run ${runId} was not recorded`);
    }
    return entry;
  };

  const states = (entry: LedgerEntry) =>
    Object.fromEntries(entry.stages.map(stage => [stage.name, stage.state]));

  it('runs every stage and records a successful run', async () => {
    setup();

    const handle = coordinator.start(ciPipeline(), { commit: 'abc123' });
    const outcome = await coordinator.wait(handle);

    expect(outcome).toBe('succeeded');
    const entry = recorded(handle.runId);
    expect(entry.pipeline).toBe('app-ci');
    expect(states(entry)).toEqual({ build: 'succeeded', test: 'succeeded', scan: 'succeeded', publish: 'succeeded' });
    expect(entry.stages.find(stage => stage.name === 'publish')?.result).toEqual({
      artifact: { id: 'app', version: 'abc123', location: 'registry.test/app:abc123' }
    });
    expect(collaborators.registry.published).toEqual([{ name: 'app', version: 'abc123', payload: 'dist/app.tar' }]);
  });

  it('runs independent stages concurrently', async () => {
    setup({ test: succeed(1000), scan: succeed(1000) });

    const handle = coordinator.start(ciPipeline());
    await coordinator.wait(handle);

    const entry = recorded(handle.runId);
    expect(collaborators.shell.maxRunning).toBe(2);
    expect(entry.completedAt.getTime() - entry.startedAt.getTime()).toBe(1000);
  });

  it('bounds concurrency with maxParallelStages', async () => {
    setup({ test: succeed(1000), scan: succeed(1000) }, { maxParallelStages: 1 });

    const handle = coordinator.start(ciPipeline());
    await coordinator.wait(handle);

    const entry = recorded(handle.runId);
    expect(collaborators.shell.maxRunning).toBe(1);
    expect(entry.completedAt.getTime() - entry.startedAt.getTime()).toBe(2000);
  });

  it('never starts a stage before its dependencies succeed', async () => {
    setup({ build: succeed(500) });

    const handle = coordinator.start(ciPipeline());
    await coordinator.wait(handle);

    const started = Object.fromEntries(collaborators.shell.calls.map(call => [call.stage, call.startedAt.getTime()]));
    expect(started.test - started.build).toBe(500);
    expect(started.scan - started.build).toBe(500);
  });

  it('skips the stages downstream of a failure and lets independent branches finish', async () => {
    setup({ test: fail('3 tests failed'), scan: succeed(1000) });

    const handle = coordinator.start(ciPipeline());
    const outcome = await coordinator.wait(handle);

    expect(outcome).toBe('failed');
    const entry = recorded(handle.runId);
    expect(states(entry)).toEqual({ build: 'succeeded', test: 'failed', scan: 'succeeded', publish: 'skipped' });
    const publish = entry.stages.find(stage => stage.name === 'publish');
    expect(publish?.skipReason).toBe('dependency "test" failed');
    expect(publish?.attempts).toBe(0);
    expect(entry.stages.find(stage => stage.name === 'test')?.error).toBe('3 tests failed');
  });

  it('skips transitively through a chain of dependents', async () => {
    setup({ compile: fail() });

    const handle = coordinator.start(pipeline('chain', [
      stage('compile'),
      stage('package', { dependsOn: ['compile'] }),
      stage('ship', { dependsOn: ['package'] })
    ]));
    await coordinator.wait(handle);

    const entry = recorded(handle.runId);
    expect(entry.stages.map(stage => [stage.name, stage.state, stage.skipReason])).toEqual([
      ['compile', 'failed', undefined],
      ['package', 'skipped', 'dependency "compile" failed'],
      ['ship', 'skipped', 'dependency "package" skipped']
    ]);
    expect(collaborators.shell.calls.map(call => call.stage)).toEqual(['compile']);
  });

  it('keeps running independent stages after a failure by default', async () => {
    setup({ lint: fail() }, { maxParallelStages: 1 });

    const handle = coordinator.start(pipeline('checks', [stage('lint'), stage('compile')]));
    await coordinator.wait(handle);

    expect(states(recorded(handle.runId))).toEqual({ lint: 'failed', compile: 'succeeded' });
  });

  it('starts no new stage after a failure when failFast is set', async () => {
    setup({ lint: fail() }, { maxParallelStages: 1, failFast: true });

    const handle = coordinator.start(pipeline('checks', [stage('lint'), stage('compile')]));
    const outcome = await coordinator.wait(handle);

    expect(outcome).toBe('failed');
    const entry = recorded(handle.runId);
    expect(states(entry)).toEqual({ lint: 'failed', compile: 'skipped' });
    expect(entry.stages[1].skipReason).toBe('an earlier stage failed');
  });

  it('cancels a run, skipping every stage that had not succeeded', async () => {
    setup({ test: hang(), scan: hang() });

    const handle = coordinator.start(ciPipeline());
    await collaborators.clock.sleep(500);
    expect(coordinator.cancel(handle)).toBe(true);
    const outcome = await coordinator.wait(handle);

    expect(outcome).toBe('cancelled');
    const entry = recorded(handle.runId);
    expect(states(entry)).toEqual({ build: 'succeeded', test: 'skipped', scan: 'skipped', publish: 'skipped' });
    expect(entry.stages.map(stage => stage.skipReason)).toEqual([undefined, 'run cancelled', 'run cancelled', 'run cancelled']);
    expect(coordinator.cancel(handle)).toBe(false);
  });

  it('cancels every in-flight run on cancelAll', async () => {
    setup({ build: hang() });

    const first = coordinator.start(ciPipeline());
    const second = coordinator.start(ciPipeline());
    await coordinator.cancelAll();

    expect(recorded(first.runId).outcome).toBe('cancelled');
    expect(recorded(second.runId).outcome).toBe('cancelled');
    expect(coordinator.listActiveRuns()).toEqual([]);
  });

  it('creates no run for an invalid definition', () => {
    setup();

    const cyclic = pipeline('cyclic', [stage('a', { dependsOn: ['b'] }), stage('b', { dependsOn: ['a'] })]);

    expect(() => coordinator.start(cyclic)).toThrow(DefinitionInvalidError);
    expect(coordinator.listActiveRuns()).toEqual([]);
    expect(ledger.query()).toEqual([]);
  });

  it('rejects unknown run handles', async () => {
    setup();
    const handle = { runId: 'missing', pipeline: 'app-ci' };

    await expect(coordinator.wait(handle)).rejects.toThrow(NotFoundError);
    expect(() => coordinator.cancel(handle)).toThrow(NotFoundError);
  });

  it('resolves wait from the ledger once the run is finished', async () => {
    setup({ test: fail() });

    const handle = coordinator.start(ciPipeline());
    await coordinator.wait(handle);

    await expect(coordinator.wait(handle)).resolves.toBe('failed');
  });

  it('exposes a snapshot of a run in progress', async () => {
    setup({ test: hang(), scan: succeed(100) });

    const handle = coordinator.start(ciPipeline());
    await collaborators.clock.sleep(200);

    const run = coordinator.getActiveRun(handle.runId);
    expect(run?.state).toBe('running');
    expect(Object.fromEntries([...(run?.stages.values() ?? [])].map(stage => [stage.name, stage.state]))).toEqual({
      build: 'succeeded',
      test: 'running',
      scan: 'succeeded',
      publish: 'pending'
    });

    coordinator.cancel(handle);
    await coordinator.wait(handle);
    expect(coordinator.getActiveRun(handle.runId)).toBeUndefined();
  });

  it('emits runCompleted once per run with the recorded entry', async () => {
    setup();
    const events: RunCompletedEvent[] = [];
    coordinator.onRunCompleted(event => events.push(event));
    coordinator.onRunCompleted(() => {
      throw new Error('listener failure');
    });

    const handle = coordinator.start(ciPipeline());
    const outcome = await coordinator.wait(handle);

    expect(outcome).toBe('succeeded');
    expect(events).toHaveLength(1);
    expect(events[0].run.id).toBe(handle.runId);
    expect(events[0].entry).toBe(recorded(handle.runId));
    expect(events[0].definition.name).toBe('app-ci');
  });

  it('reports stage and run telemetry to the metrics sink', async () => {
    setup();

    const handle = coordinator.start(ciPipeline());
    await coordinator.wait(handle);

    expect(sink.sampleNames().filter(name => name === 'stage_duration_ms')).toHaveLength(4);
    expect(sink.sampleNames().filter(name => name === 'run_duration_ms')).toHaveLength(1);
    const runLogs = sink.batches.flatMap(batch => (batch.kind === 'logs' ? batch.lines : []))
      .filter(line => line.message === `run ${handle.runId} succeeded`);
    expect(runLogs).toHaveLength(1);
  });

  it('is not affected by a failing metrics sink', async () => {
    setup();
    sink.ingest = async () => {
      throw new Error('sink unavailable');
    };

    const handle = coordinator.start(ciPipeline());

    await expect(coordinator.wait(handle)).resolves.toBe('succeeded');
  });
});
