import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { WorkloadSpec } from '../models/Pipeline.js';
import { createHttpClient, HttpClientOptions, rejectionReason, RequestOptions } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

export type ApplyResult =
  | { status: 'accepted'; revision?: string }
  | { status: 'rejected'; reason: string };

export interface WorkloadStatus {
  desiredReplicas: number;
  readyReplicas: number;
  lastError?: string;
}

export interface DeploymentPlatform {
  apply(workload: WorkloadSpec, options?: RequestOptions): Promise<ApplyResult>;
  status(selector: string, options?: RequestOptions): Promise<WorkloadStatus>;
}

const workloadStatusSchema = z.object({
  desiredReplicas: z.number().int().nonnegative(),
  readyReplicas: z.number().int().nonnegative(),
  lastError: z.string().nullish()
});

const logger = createLogger('DeploymentPlatform');

export class HttpDeploymentPlatform implements DeploymentPlatform {
  private client: AxiosInstance;

  constructor(baseURL: string, options: HttpClientOptions = {}) {
    this.client = createHttpClient(baseURL, options);
  }

  async apply(workload: WorkloadSpec, options: RequestOptions = {}): Promise<ApplyResult> {
    logger.info(`Applying workload ${workload.name} (${workload.replicas} replicas, image ${workload.image ?? 'unset'})`);
    try {
      const response = await this.client.post<{ revision?: unknown }>('/workloads', workload, { signal: options.signal });
      const revision = response.data?.revision;
      return { status: 'accepted', revision: typeof revision === 'string' ? revision : undefined };
    } catch (error) {
      const reason = rejectionReason(error);
      if (reason === undefined) {
        throw error;
      }
      logger.warn(`Platform rejected workload ${workload.name}: ${reason}`);
      return { status: 'rejected', reason };
    }
  }

  async status(selector: string, options: RequestOptions = {}): Promise<WorkloadStatus> {
    const response = await this.client.get<unknown>(`/workloads/${encodeURIComponent(selector)}/status`, { signal: options.signal });
    const parsed = workloadStatusSchema.parse(response.data);
    return {
      desiredReplicas: parsed.desiredReplicas,
      readyReplicas: parsed.readyReplicas,
      lastError: parsed.lastError ?? undefined
    };
  }
}
