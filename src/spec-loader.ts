/**
 * Spec loading
 *
 * Reads an OpenAPI document from a file path, a `file://` URI or an
 * http(s) URL, builds the resolved Spec for a set of route patterns and
 * consults the spec cache around the build. All I/O of a load happens here;
 * resolution itself is synchronous.
 */

import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import type { OpenAPIV3 } from 'openapi-types';
import { SpecLoadError } from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { buildSpec } from './operation-extractor.js';
import { cacheKey, type SpecCache } from './spec-cache.js';
import type { Spec } from './types/spec.js';
import { isHttpUrl, isRecord } from './validation-utils.js';

export type FetchFn = typeof fetch;

export interface SpecLoaderOptions {
  logger: Logger;
  cache?: SpecCache;
  metrics?: MetricsCollector;
  fetch?: FetchFn;
  maxDepth?: number;
}

export interface LoadOptions {
  /** false bypasses both cache read and cache write */
  useCache?: boolean;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isOpenApiDocument(value: unknown): value is OpenAPIV3.Document {
  return isRecord(value) && isRecord(value.paths);
}

/**
 * Fetch the raw document text
 */
export async function readSource(source: string, fetchFn: FetchFn = fetch): Promise<string> {
  if (isHttpUrl(source)) {
    let response: Response;
    try {
      response = await fetchFn(source);
    } catch (error) {
      throw new SpecLoadError(source, `request failed: ${reasonOf(error)}`, error);
    }
    if (!response.ok) {
      throw new SpecLoadError(source, `HTTP ${response.status}`);
    }
    return response.text();
  }

  const filePath = source.startsWith('file://') ? fileURLToPath(source) : source;
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SpecLoadError(source, reasonOf(error), error);
  }
}

/**
 * Parse as JSON when the source names a .json file, YAML otherwise
 */
export function parseDocument(text: string, source: string): OpenAPIV3.Document {
  const location = isHttpUrl(source) ? new URL(source).pathname : source;

  let data: unknown;
  try {
    data = location.toLowerCase().endsWith('.json') ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new SpecLoadError(source, `unparsable document: ${reasonOf(error)}`, error);
  }

  if (!isOpenApiDocument(data)) {
    throw new SpecLoadError(source, 'document has no paths object');
  }
  return data;
}

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class SpecLoader {
  private readonly logger: Logger;
  private readonly cache?: SpecCache;
  private readonly metrics?: MetricsCollector;
  private readonly fetchFn: FetchFn;
  private readonly maxDepth?: number;

  constructor(options: SpecLoaderOptions) {
    this.logger = options.logger;
    this.cache = options.cache;
    this.metrics = options.metrics;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.maxDepth = options.maxDepth;
  }

  /**
   * Return the Spec for (source, routePatterns), from cache when possible.
   * The result is deeply frozen.
   */
  async loadOrBuild(source: string, routePatterns: readonly string[], options: LoadOptions = {}): Promise<Spec> {
    const useCache = (options.useCache ?? true) && this.cache !== undefined;
    const key = cacheKey(source, routePatterns);

    if (useCache) {
      const cached = await this.lookup(key);
      if (cached) {
        this.logger.info('Loading cached OpenAPI spec', { source, key });
        this.metrics?.recordSpecLoad('cache_hit');
        return deepFreeze(cached);
      }
    }

    this.logger.info('Cold loading OpenAPI spec', { source });
    let spec: Spec;
    try {
      const text = await readSource(source, this.fetchFn);
      spec = buildSpec(parseDocument(text, source), routePatterns, this.maxDepth);
    } catch (error) {
      this.metrics?.recordSpecLoad('failed');
      throw error;
    }
    this.metrics?.recordSpecLoad('built');

    if (useCache) {
      await this.store(key, spec);
    }
    return deepFreeze(spec);
  }

  private async lookup(key: string): Promise<Spec | undefined> {
    if (!this.cache) return undefined;
    try {
      return await this.cache.lookup(key);
    } catch (error) {
      this.logger.warn('Spec cache read failed', { key, reason: reasonOf(error) });
      return undefined;
    }
  }

  private async store(key: string, spec: Spec): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.store(key, spec);
    } catch (error) {
      this.logger.warn('Spec cache write failed', { key, reason: reasonOf(error) });
    }
  }
}
