import { AxiosInstance } from 'axios';
import { createHttpClient, HttpClientOptions } from '../utils/http.js';

export interface MetricSample {
  name: string;
  value: number;
  timestamp: Date;
  labels?: Record<string, string>;
}

export interface LogLine {
  timestamp: Date;
  level: 'info' | 'warn' | 'error';
  message: string;
  labels?: Record<string, string>;
}

export type SinkBatch =
  | { kind: 'samples'; samples: MetricSample[] }
  | { kind: 'logs'; lines: LogLine[] };

/** Write-only telemetry destination. Nothing reads back what it ingests. */
export interface MetricsSink {
  ingest(batch: SinkBatch): Promise<void>;
}

export class NullMetricsSink implements MetricsSink {
  async ingest(): Promise<void> {
    // discarded
  }
}

export class HttpMetricsSink implements MetricsSink {
  private client: AxiosInstance;

  constructor(baseURL: string, options: HttpClientOptions = {}) {
    this.client = createHttpClient(baseURL, { timeoutMs: 5000, ...options });
  }

  async ingest(batch: SinkBatch): Promise<void> {
    const path = batch.kind === 'samples' ? '/ingest/samples' : '/ingest/logs';
    const body = batch.kind === 'samples'
      ? batch.samples.map(sample => ({ ...sample, timestamp: sample.timestamp.toISOString() }))
      : batch.lines.map(line => ({ ...line, timestamp: line.timestamp.toISOString() }));
    await this.client.post(path, body);
  }
}
