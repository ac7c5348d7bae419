import { AppConfig } from '../config/config.js';
import { Clock, systemClock } from '../utils/clock.js';
import { ArtifactRegistry, HttpArtifactRegistry } from './artifact-registry.service.js';
import { DeploymentPlatform, HttpDeploymentPlatform } from './deployment-platform.service.js';
import { HealthGateService } from './health-gate.service.js';
import { LedgerStore, MemoryLedgerStore, SqliteLedgerStore } from './ledger-store.js';
import { HttpMetricsSink, MetricsSink, NullMetricsSink } from './metrics-sink.service.js';
import { PipelineDefinitionService } from './pipeline-definition.service.js';
import { RunCoordinatorService } from './run-coordinator.service.js';
import { RunLedgerService } from './run-ledger.service.js';
import { RunStorageService } from './run-storage.service.js';
import { SchedulerService } from './scheduler.service.js';
import { createStageActionHandlers, StageActionHandlers } from './stage-actions.js';
import { StageExecutorService } from './stage-executor.service.js';
import { StatusService } from './status.service.js';
import { TriggerBridgeService } from './trigger-bridge.service.js';

export interface Services {
  definitions: PipelineDefinitionService;
  healthGate: HealthGateService;
  executor: StageExecutorService;
  ledger: RunLedgerService;
  coordinator: RunCoordinatorService;
  bridge: TriggerBridgeService;
  scheduler: SchedulerService;
  status: StatusService;
  storage: RunStorageService;
  /** Stops triggering new runs, cancels in-flight ones and closes the ledger. */
  shutdown(): Promise<void>;
}

/** Collaborators that tests swap for in-process fakes. */
export interface ServiceOverrides {
  clock?: Clock;
  registry?: ArtifactRegistry;
  platform?: DeploymentPlatform;
  metrics?: MetricsSink;
  ledgerStore?: LedgerStore;
  handlers?: Partial<StageActionHandlers>;
}

function createLedgerStore(config: AppConfig): LedgerStore {
  return config.ledger.driver === 'memory'
    ? new MemoryLedgerStore()
    : new SqliteLedgerStore(config.ledger.path);
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const registry = overrides.registry ?? new HttpArtifactRegistry(config.registry.url, { timeoutMs: config.http.timeoutMs });
  const platform = overrides.platform ?? new HttpDeploymentPlatform(config.platform.url, { timeoutMs: config.http.timeoutMs });
  const metrics = overrides.metrics ?? (config.metrics.url ? new HttpMetricsSink(config.metrics.url) : new NullMetricsSink());
  const store = overrides.ledgerStore ?? createLedgerStore(config);

  const definitions = new PipelineDefinitionService(config.stages.defaultTimeoutMs);
  const healthGate = new HealthGateService(platform, clock, config.healthCheck);
  const storage = new RunStorageService(config.runStorage.dir);
  const executor = new StageExecutorService(
    createStageActionHandlers({ registry, platform, healthGate }, overrides.handlers),
    {
      clock,
      storage,
      backoff: { baseDelayMs: config.stages.retryBaseDelayMs, maxDelayMs: config.stages.retryMaxDelayMs }
    }
  );
  const ledger = new RunLedgerService(store);
  const coordinator = new RunCoordinatorService(executor, ledger, { config: config.coordinator, clock, metrics });
  const bridge = new TriggerBridgeService(coordinator, name => definitions.find(name));
  const detach = bridge.attach();
  const scheduler = new SchedulerService(coordinator, definitions);
  const status = new StatusService(ledger, coordinator, bridge);

  return {
    definitions,
    healthGate,
    executor,
    ledger,
    coordinator,
    bridge,
    scheduler,
    status,
    storage,
    async shutdown() {
      detach();
      scheduler.stopAll();
      await coordinator.cancelAll();
      store.close();
    }
  };
}
