/**
 * Upstream API proxy
 *
 * Executes one ToolRequest against the upstream API. Each call is
 * independent: its own fetch, its own timeout, no connection state kept
 * between calls.
 */

import { HTTP_STATUS } from './constants.js';
import { NetworkError, UpstreamTimeoutError } from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { CassetteRecorder } from './recorder.js';
import { encodeFormBody, serializeParams, type ArrayFormat, type QueryValue, type ToolRequest } from './request-builder.js';
import type { FetchFn } from './spec-loader.js';

/** Node's IncomingHttpHeaders shape; keys are lower-cased */
export type IncomingHeaders = Record<string, string | string[] | undefined>;

export interface ApiProxyOptions {
  logger: Logger;
  /** Header names copied from the incoming MCP request */
  forwardHeaders?: string[];
  /** Incoming header name -> upstream query parameter name */
  forwardQueryParams?: Record<string, string>;
  timeoutMs?: number;
  arrayFormat?: ArrayFormat;
  fetch?: FetchFn;
  recorder?: Pick<CassetteRecorder, 'record'>;
  metrics?: MetricsCollector;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export function isSuccessStatus(status: number): boolean {
  return status >= HTTP_STATUS.OK && status < HTTP_STATUS.MULTIPLE_CHOICES;
}

function headerValue(headers: IncomingHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(', ') : value;
}

export class ApiProxy {
  private readonly logger: Logger;
  private readonly forwardHeaders: string[];
  private readonly forwardQueryParams: Record<string, string>;
  private readonly timeoutMs?: number;
  private readonly arrayFormat: ArrayFormat;
  private readonly fetchFn: FetchFn;
  private readonly recorder?: Pick<CassetteRecorder, 'record'>;
  private readonly metrics?: MetricsCollector;

  constructor(options: ApiProxyOptions) {
    this.logger = options.logger;
    this.forwardHeaders = options.forwardHeaders ?? [];
    this.forwardQueryParams = options.forwardQueryParams ?? {};
    this.timeoutMs = options.timeoutMs;
    this.arrayFormat = options.arrayFormat ?? 'repeat';
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.recorder = options.recorder;
    this.metrics = options.metrics;
  }

  /**
   * Forwarded headers and forwarded query parameters are taken from the
   * incoming request and override values of the same name from the tool call.
   */
  async execute(request: ToolRequest, incoming: IncomingHeaders = {}): Promise<ApiResponse> {
    const params: Record<string, QueryValue> = { ...request.params };
    for (const [header, queryParam] of Object.entries(this.forwardQueryParams)) {
      const value = headerValue(incoming, header);
      if (value !== undefined) params[queryParam] = value;
    }

    const headers: Record<string, string> = { ...request.headers };
    for (const header of this.forwardHeaders) {
      const value = headerValue(incoming, header);
      if (value !== undefined) headers[header] = value;
    }

    let body: string | undefined;
    if (request.body) {
      headers['Content-Type'] = request.body.contentType;
      body = request.body.contentType === 'application/x-www-form-urlencoded'
        ? encodeFormBody(request.body.data).toString()
        : JSON.stringify(request.body.data);
    }

    const query = serializeParams(params, this.arrayFormat).toString();
    const url = query ? `${request.url}?${query}` : request.url;

    this.logger.info(`Making ${request.method} request to ${request.url}`, { url, params, headers });
    if (request.body) {
      this.logger.debug('Request body', { body: request.body.data });
    }

    const response = await this.send(request.method, url, request.url, headers, body);

    if (this.recorder) {
      try {
        await this.recorder.record(
          { method: request.method, url: request.url, params, body: request.body?.data, headers },
          { status_code: response.status, headers: response.headers, text: response.body }
        );
      } catch (error) {
        this.logger.warn('Failed to record cassette', {
          url: request.url,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return response;
  }

  /**
   * The timer is cleared on every exit path, including a failed body read.
   * Errors name `target` (no query string) since the query may carry
   * forwarded credentials.
   */
  private async send(
    method: string,
    url: string,
    target: string,
    headers: Record<string, string>,
    body: string | undefined
  ): Promise<ApiResponse> {
    const controller = new AbortController();
    const timer = this.timeoutMs !== undefined
      ? setTimeout(() => controller.abort(), this.timeoutMs)
      : undefined;
    const startTime = Date.now();

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: controller.signal,
      });
      const text = await response.text();

      this.metrics?.recordApiCall(method, response.status, (Date.now() - startTime) / 1000);
      return {
        status: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        body: text,
      };
    } catch (error) {
      if (controller.signal.aborted && this.timeoutMs !== undefined) {
        this.metrics?.recordApiCallError(method, 'timeout');
        throw new UpstreamTimeoutError(target, this.timeoutMs);
      }
      this.metrics?.recordApiCallError(method, 'network');
      throw new NetworkError(
        `Request to ${target} failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { url: target }
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
