// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import * as http from 'http';
import type { LoggerLike } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

export type CounterName =
  | 'authorize_requests'
  | 'authorize_decode_errors'
  | 'authorize_stage_unregistered'
  | 'authorize_responses'
  | 'authorize_render_failures';

export type HistogramName = 'authorize_request_duration';

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<CounterName, Counter> = new Map();
  private histograms: Map<HistogramName, Histogram> = new Map();
  private server?: http.Server;
  private logger?: LoggerLike;

  constructor(config: MetricsConfig = {}, logger?: LoggerLike) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    this.counters.set(
      'authorize_requests',
      new Counter({
        name: 'authorize_requests_total',
        help: 'Authorization requests dispatched',
        labelNames: ['stage'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'authorize_decode_errors',
      new Counter({
        name: 'authorize_decode_errors_total',
        help: 'Authorization requests that failed validation',
        labelNames: ['code'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'authorize_stage_unregistered',
      new Counter({
        name: 'authorize_stage_unregistered_total',
        help: 'Requests for a stage with no registered handler',
        labelNames: ['stage'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'authorize_responses',
      new Counter({
        name: 'authorize_responses_total',
        help: 'Responses written by the authorization endpoint',
        labelNames: ['kind', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'authorize_render_failures',
      new Counter({
        name: 'authorize_render_failures_total',
        help: 'Responders that failed to render',
        labelNames: ['code'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'authorize_request_duration',
      new Histogram({
        name: 'authorize_request_duration_seconds',
        help: 'Authorization endpoint request duration',
        labelNames: ['stage'],
        buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: CounterName, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: HistogramName, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Failed to collect metrics', { error });
          res.statusCode = 500;
          res.end('Internal Server Error');
        });
    });

    this.server.on('error', (error: NodeJS.ErrnoException) => {
      this.logger?.error('MetricsCollector server error', { errorCode: error.code, error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (server) {
      return new Promise((resolve) => {
        server.close(() => resolve());
      });
    }
  }
}
