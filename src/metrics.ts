/**
 * Prometheus metrics collector
 *
 * Tracks:
 * - HTTP requests (status, method, path)
 * - MCP tool calls (count, duration, errors) per namespace
 * - Upstream API calls made by the proxy
 * - Spec loads by outcome (cache hit, built, failed)
 */

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
}

export type SpecLoadOutcome = 'cache_hit' | 'built' | 'failed';

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  private httpRequestsTotal: Counter;
  private httpRequestDuration: Histogram;

  private toolCallsTotal: Counter;
  private toolCallDuration: Histogram;
  private toolCallErrors: Counter;

  private apiCallsTotal: Counter;
  private apiCallDuration: Histogram;
  private apiCallErrors: Counter;

  private specLoadsTotal: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = new Registry();

    const prefix = config.prefix || 'mcp_';

    this.httpRequestsTotal = new Counter({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'path', 'status'],
      buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.toolCallsTotal = new Counter({
      name: `${prefix}tool_calls_total`,
      help: 'Total number of MCP tool calls',
      labelNames: ['namespace', 'tool', 'status'],
      registers: [this.registry],
    });

    this.toolCallDuration = new Histogram({
      name: `${prefix}tool_call_duration_seconds`,
      help: 'MCP tool call duration in seconds',
      labelNames: ['namespace', 'tool', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.toolCallErrors = new Counter({
      name: `${prefix}tool_call_errors_total`,
      help: 'Total number of MCP tool call errors',
      labelNames: ['namespace', 'tool', 'error_type'],
      registers: [this.registry],
    });

    this.apiCallsTotal = new Counter({
      name: `${prefix}api_calls_total`,
      help: 'Total number of API calls to upstream',
      labelNames: ['method', 'status'],
      registers: [this.registry],
    });

    this.apiCallDuration = new Histogram({
      name: `${prefix}api_call_duration_seconds`,
      help: 'API call duration in seconds',
      labelNames: ['method', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.apiCallErrors = new Counter({
      name: `${prefix}api_call_errors_total`,
      help: 'Total number of API calls that failed without a response',
      labelNames: ['method', 'error_type'],
      registers: [this.registry],
    });

    this.specLoadsTotal = new Counter({
      name: `${prefix}spec_loads_total`,
      help: 'Total number of OpenAPI spec loads',
      labelNames: ['outcome'],
      registers: [this.registry],
    });
  }

  recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = {
      method,
      path: this.normalizePath(path),
      status: status.toString(),
    };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, durationSeconds);
  }

  recordToolCall(namespace: string, tool: string, status: 'success' | 'error', durationSeconds: number): void {
    if (!this.enabled) return;

    this.toolCallsTotal.inc({ namespace, tool, status });
    this.toolCallDuration.observe({ namespace, tool, status }, durationSeconds);
  }

  recordToolCallError(namespace: string, tool: string, errorType: string): void {
    if (!this.enabled) return;
    this.toolCallErrors.inc({ namespace, tool, error_type: errorType });
  }

  /**
   * Record a completed upstream call (any status)
   */
  recordApiCall(method: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const statusLabel = this.getStatusLabel(status);
    this.apiCallsTotal.inc({ method, status: statusLabel });
    this.apiCallDuration.observe({ method, status: statusLabel }, durationSeconds);
  }

  recordApiCallError(method: string, errorType: string): void {
    if (!this.enabled) return;
    this.apiCallErrors.inc({ method, error_type: errorType });
  }

  recordSpecLoad(outcome: SpecLoadOutcome): void {
    if (!this.enabled) return;
    this.specLoadsTotal.inc({ outcome });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Drop the query string; namespaces come from config so the remaining
   * path has bounded cardinality.
   */
  private normalizePath(path: string): string {
    return path.split('?')[0];
  }

  /**
   * Group statuses (2xx, 4xx, 5xx) to keep label cardinality low
   */
  private getStatusLabel(status: number): string {
    if (status >= 200 && status < 300) return '2xx';
    if (status >= 300 && status < 400) return '3xx';
    if (status >= 400 && status < 500) return '4xx';
    if (status >= 500 && status < 600) return '5xx';
    return 'unknown';
  }
}
