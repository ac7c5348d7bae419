import { z } from 'zod';

const healthCheckSchema = z.object({
  selector: z.string().min(1).optional(),
  intervalMs: z.number().positive().finite().optional(),
  maxAttempts: z.number().int().positive().optional(),
  successThreshold: z.number().int().positive().optional(),
  deadlineMs: z.number().positive().finite().optional()
});

const environmentSchema = z.record(z.string());

const actionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('shell'),
    command: z.string().min(1),
    cwd: z.string().optional(),
    environment: environmentSchema.optional()
  }),
  z.object({
    kind: z.literal('publish'),
    artifact: z.string().min(1),
    payload: z.string().min(1)
  }),
  z.object({
    kind: z.literal('deploy'),
    workload: z.object({
      name: z.string().min(1),
      image: z.string().optional(),
      replicas: z.number().int().positive().default(1),
      environment: environmentSchema.optional()
    }),
    selector: z.string().min(1).optional(),
    healthCheck: healthCheckSchema.optional()
  }),
  z.object({
    kind: z.literal('verify'),
    selector: z.string().min(1).optional(),
    healthCheck: healthCheckSchema.optional()
  })
]);

export const stageSpecSchema = z.object({
  name: z.string().min(1),
  classification: z.enum(['build', 'test', 'security', 'publish', 'deploy', 'verify']),
  action: actionSchema,
  dependsOn: z.array(z.string()).default([]),
  timeoutMs: z.number().positive().finite().optional(),
  retries: z.number().int().nonnegative().default(0)
});

export const pipelineDefinitionSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1).default('1'),
  kind: z.enum(['ci', 'cd']),
  description: z.string().optional(),
  stages: z.array(stageSpecSchema),
  downstream: z.string().min(1).optional(),
  schedule: z.object({
    cron: z.string().min(1),
    timezone: z.string().optional()
  }).optional()
});

export const pipelinesFileSchema = z.object({
  pipelines: z.array(pipelineDefinitionSchema)
});

export type PipelineDefinitionInput = z.infer<typeof pipelineDefinitionSchema>;
