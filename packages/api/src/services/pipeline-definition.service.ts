import * as fs from 'fs';
import { HealthCheckPolicy, PipelineDefinition, StageSpec, ValidatedPipeline } from '../models/Pipeline.js';
import { PipelineDefinitionInput, pipelinesFileSchema } from '../schemas/pipeline.schemas.js';
import { DefinitionInvalidError, NotFoundError, ValidationError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PipelineDefinitionService');

function checkHealthPolicy(stage: StageSpec, policy: Partial<HealthCheckPolicy> | undefined, problems: string[]): void {
  if (!policy) return;
  const positive: (keyof HealthCheckPolicy)[] = ['intervalMs', 'maxAttempts', 'successThreshold', 'deadlineMs'];
  const invalid = positive.filter(field => {
    const value = policy[field];
    return value !== undefined && (typeof value !== 'number' || !Number.isFinite(value) || value <= 0);
  });
  for (const field of invalid) {
    problems.push(`stage "${stage.name}" health check ${field} must be a positive finite number`);
  }
  if (invalid.length > 0) return;

  const { intervalMs, maxAttempts, successThreshold, deadlineMs } = policy;
  if (successThreshold !== undefined && maxAttempts !== undefined && successThreshold > maxAttempts) {
    problems.push(`stage "${stage.name}" health check needs ${successThreshold} healthy polls but allows only ${maxAttempts} attempts`);
  }
  const deadline = deadlineMs ?? (intervalMs !== undefined && maxAttempts !== undefined ? intervalMs * maxAttempts : undefined);
  if (deadline !== undefined && deadline >= stage.timeoutMs) {
    problems.push(`stage "${stage.name}" health check deadline of ${deadline}ms does not fit in its timeout of ${stage.timeoutMs}ms`);
  }
}

/**
 * Checks the stage graph and computes its topological order (Kahn's
 * algorithm, ties broken by declaration order). The returned definition is a
 * frozen copy, so a run can never observe later edits.
 */
export function validatePipeline(definition: PipelineDefinition): ValidatedPipeline {
  const problems: string[] = [];
  const stagesByName = new Map<string, StageSpec>();

  if (definition.stages.length === 0) {
    problems.push('pipeline has no stages');
  }

  for (const stage of definition.stages) {
    if (!stage.name) {
      problems.push('stage with an empty name');
      continue;
    }
    if (stagesByName.has(stage.name)) {
      problems.push(`duplicate stage "${stage.name}"`);
      continue;
    }
    if (!Number.isFinite(stage.timeoutMs) || stage.timeoutMs <= 0) {
      problems.push(`stage "${stage.name}" timeout must be a positive finite number`);
    }
    if (!Number.isInteger(stage.retries) || stage.retries < 0) {
      problems.push(`stage "${stage.name}" retries must be a non-negative integer`);
    }
    if (stage.action.kind === 'deploy' || stage.action.kind === 'verify') {
      checkHealthPolicy(stage, stage.action.healthCheck, problems);
    }
    stagesByName.set(stage.name, stage);
  }

  const dependents = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  for (const name of stagesByName.keys()) {
    dependents.set(name, []);
    inDegree.set(name, 0);
  }

  for (const stage of stagesByName.values()) {
    for (const dependency of new Set(stage.dependsOn)) {
      if (dependency === stage.name) {
        problems.push(`stage "${stage.name}" depends on itself`);
        continue;
      }
      const edges = dependents.get(dependency);
      if (!edges) {
        problems.push(`stage "${stage.name}" depends on unknown stage "${dependency}"`);
        continue;
      }
      edges.push(stage.name);
      inDegree.set(stage.name, (inDegree.get(stage.name) ?? 0) + 1);
    }
  }

  const order: string[] = [];
  const ready = [...stagesByName.keys()].filter(name => inDegree.get(name) === 0);
  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
  }

  if (problems.length === 0 && order.length < stagesByName.size) {
    const cyclic = [...stagesByName.keys()].filter(name => !order.includes(name));
    problems.push(`dependency cycle among stages: ${cyclic.join(', ')}`);
  }

  if (problems.length > 0) {
    throw new DefinitionInvalidError(definition.name, problems);
  }

  const frozen = deepFreeze(structuredClone(definition));
  return {
    definition: frozen,
    stagesByName: new Map(frozen.stages.map(stage => [stage.name, stage])),
    order
  };
}

export function toPipelineDefinition(input: PipelineDefinitionInput, defaultTimeoutMs: number): PipelineDefinition {
  return {
    name: input.name,
    version: input.version,
    kind: input.kind,
    description: input.description,
    downstream: input.downstream,
    schedule: input.schedule,
    stages: input.stages.map(stage => ({
      name: stage.name,
      classification: stage.classification,
      action: stage.action,
      dependsOn: stage.dependsOn,
      timeoutMs: stage.timeoutMs ?? defaultTimeoutMs,
      retries: stage.retries
    }))
  };
}

/**
 * Registry of the pipeline definitions this service knows by name.
 */
export class PipelineDefinitionService {
  private definitions = new Map<string, ValidatedPipeline>();

  constructor(private defaultTimeoutMs: number) {}

  register(definition: PipelineDefinition): ValidatedPipeline {
    const validated = validatePipeline(definition);
    this.store(validated);
    return validated;
  }

  private store(validated: ValidatedPipeline): void {
    const { definition } = validated;
    this.definitions.set(definition.name, validated);
    logger.info(`Registered pipeline ${definition.name}@${definition.version} (${validated.order.join(' -> ')})`);
  }

  get(name: string): PipelineDefinition {
    const validated = this.definitions.get(name);
    if (!validated) {
      throw new NotFoundError(`Pipeline ${name} not found`);
    }
    return validated.definition;
  }

  find(name: string): PipelineDefinition | undefined {
    return this.definitions.get(name)?.definition;
  }

  list(): PipelineDefinition[] {
    return [...this.definitions.values()].map(validated => validated.definition);
  }

  loadFromObject(raw: unknown): PipelineDefinition[] {
    const parsed = pipelinesFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(`Invalid pipelines file: ${issue.path.join('.')}: ${issue.message}`);
    }
    const pending = new Map<string, ValidatedPipeline>();
    for (const input of parsed.data.pipelines) {
      if (pending.has(input.name)) {
        throw new ValidationError(`Invalid pipelines file: pipeline ${input.name} is defined more than once`);
      }
      pending.set(input.name, validatePipeline(toPipelineDefinition(input, this.defaultTimeoutMs)));
    }

    for (const { definition } of pending.values()) {
      if (!definition.downstream) continue;
      const downstream = pending.get(definition.downstream) ?? this.definitions.get(definition.downstream);
      if (!downstream) {
        throw new ValidationError(`Pipeline ${definition.name} names unknown downstream pipeline ${definition.downstream}`);
      }
      if (definition.kind !== 'ci' || downstream.definition.kind !== 'cd') {
        throw new ValidationError(`Pipeline ${definition.name} may only hand off from a ci pipeline to a cd pipeline`);
      }
    }

    for (const validated of pending.values()) {
      this.store(validated);
    }
    return [...pending.values()].map(validated => validated.definition);
  }

  loadFromFile(filePath: string): PipelineDefinition[] {
    if (!fs.existsSync(filePath)) {
      logger.warn(`Pipelines file ${filePath} not found, no pipelines loaded`);
      return [];
    }
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    return this.loadFromObject(raw);
  }
}
