/**
 * Cassette recorder
 *
 * Persists each proxied request/response pair as one JSON file so upstream
 * traffic can be inspected or replayed later.
 */

import fs from 'fs/promises';
import path from 'path';
import { DEFAULTS } from './constants.js';
import type { Logger } from './logger.js';
import { isHttpUrl } from './validation-utils.js';

export interface CassetteRequest {
  method: string;
  url: string;
  params: Record<string, string | string[]>;
  body?: unknown;
  headers: Record<string, string>;
}

export interface CassetteResponse {
  status_code: number;
  headers: Record<string, string>;
  text: string;
}

export interface Cassette {
  request: CassetteRequest;
  response: CassetteResponse;
  timestamp: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYYMMDD_HHMMSS`
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_`
    + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * `<timestamp>_<method>_<last url path segment>.json`
 */
export function cassetteFileName(method: string, url: string, timestamp: string): string {
  const pathname = isHttpUrl(url) ? new URL(url).pathname : url.split('?')[0];
  const segment = pathname.split('/').filter(Boolean).pop() ?? 'root';
  return `${timestamp}_${method.toLowerCase()}_${segment}.json`;
}

export class CassetteRecorder {
  constructor(
    private readonly logger: Logger,
    readonly directory: string = DEFAULTS.CASSETTE_DIR
  ) {}

  /**
   * Write one cassette and return its path
   */
  async record(request: CassetteRequest, response: CassetteResponse, now: Date = new Date()): Promise<string> {
    const timestamp = formatTimestamp(now);
    const cassette: Cassette = { request, response, timestamp };
    const cassettePath = path.join(this.directory, cassetteFileName(request.method, request.url, timestamp));

    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(cassettePath, JSON.stringify(cassette, null, 2), 'utf-8');

    this.logger.info('Request recorded', { cassette: cassettePath });
    return cassettePath;
  }
}
