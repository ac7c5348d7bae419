import { AxiosInstance } from 'axios';
import { createHttpClient, HttpClientOptions, rejectionReason, RequestOptions } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

export type PublishResult =
  | { status: 'accepted'; location?: string }
  | { status: 'rejected'; reason: string };

export interface ArtifactRegistry {
  publish(name: string, version: string, payload: string, options?: RequestOptions): Promise<PublishResult>;
}

const logger = createLogger('ArtifactRegistry');

export class HttpArtifactRegistry implements ArtifactRegistry {
  private client: AxiosInstance;

  constructor(baseURL: string, options: HttpClientOptions = {}) {
    this.client = createHttpClient(baseURL, options);
  }

  async publish(name: string, version: string, payload: string, options: RequestOptions = {}): Promise<PublishResult> {
    logger.info(`Publishing ${name}@${version}`);
    try {
      const response = await this.client.post<{ location?: unknown }>('/artifacts', { name, version, payload }, { signal: options.signal });
      const location = typeof response.data?.location === 'string' ? response.data.location : undefined;
      return { status: 'accepted', location };
    } catch (error) {
      const reason = rejectionReason(error);
      if (reason === undefined) {
        throw error;
      }
      logger.warn(`Registry rejected ${name}@${version}: ${reason}`);
      return { status: 'rejected', reason };
    }
  }
}
