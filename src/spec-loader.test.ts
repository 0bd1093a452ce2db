/**
 * Tests for spec loading from files and URLs, with and without the cache
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import { stringify as toYaml } from 'yaml';
import { SpecLoadError } from './errors.js';
import { MetricsCollector } from './metrics.js';
import { MemoryCacheStore, SpecCache, cacheKey } from './spec-cache.js';
import { SpecLoader, parseDocument, readSource } from './spec-loader.js';
import { SPECS_URL, resetMockServer, startMockServer, stopMockServer } from './testing/mock-api-server.js';
import { createMockLogger } from './testing/mock-logger.js';
import { weatherDocument } from './testing/fixtures.js';
import type { Logger } from './logger.js';

beforeAll(() => startMockServer());
afterEach(() => resetMockServer());
afterAll(() => stopMockServer());

describe('parseDocument', () => {
  it('should parse JSON for .json sources and YAML otherwise', () => {
    const json = JSON.stringify(weatherDocument);
    expect(parseDocument(json, 'api.json').info.title).toBe('Weather');
    expect(parseDocument(toYaml(weatherDocument), 'api.yaml').info.title).toBe('Weather');
    expect(parseDocument(json, 'https://example.com/spec.JSON?v=2').info.title).toBe('Weather');
  });

  it('should reject a document without paths', () => {
    expect(() => parseDocument('openapi: 3.0.0\ninfo: {}\n', 'api.yaml')).toThrow(
      'Failed to load OpenAPI spec from api.yaml: document has no paths object'
    );
  });

  it('should reject unparsable text', () => {
    expect(() => parseDocument('{"paths": ', 'api.json')).toThrow(SpecLoadError);
  });
});

describe('readSource', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'spec-loader-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should read plain paths and file:// URIs', async () => {
    const file = path.join(directory, 'api.yaml');
    await fs.writeFile(file, 'paths: {}\n');

    expect(await readSource(file)).toBe('paths: {}\n');
    expect(await readSource(pathToFileURL(file).href)).toBe('paths: {}\n');
  });

  it('should fail for a missing file', async () => {
    await expect(readSource(path.join(directory, 'missing.yaml'))).rejects.toThrow(SpecLoadError);
  });

  it('should fail on a non-2xx response', async () => {
    await expect(readSource(`${SPECS_URL}/missing.json`)).rejects.toThrow(
      `Failed to load OpenAPI spec from ${SPECS_URL}/missing.json: HTTP 404`
    );
  });
});

describe('SpecLoader', () => {
  let logger: Logger;
  let backend: MemoryCacheStore;
  let metrics: MetricsCollector;
  let loader: SpecLoader;

  beforeEach(() => {
    logger = createMockLogger();
    backend = new MemoryCacheStore();
    metrics = new MetricsCollector({ enabled: true });
    loader = new SpecLoader({ logger, cache: new SpecCache(backend, logger), metrics });
  });

  it('should build from a URL and store the result', async () => {
    const spec = await loader.loadOrBuild(`${SPECS_URL}/weather.json`, ['/forecast$']);

    expect(spec.paths.map(p => p.path)).toEqual(['/forecast']);
    expect(spec.baseUrl).toBe('https://weather.example.com/v1');
    expect(await backend.get(cacheKey(`${SPECS_URL}/weather.json`, ['/forecast$']))).toBeDefined();
    expect(logger.info).toHaveBeenCalledWith('Cold loading OpenAPI spec', { source: `${SPECS_URL}/weather.json` });
  });

  it('should load YAML over HTTP', async () => {
    const spec = await loader.loadOrBuild(`${SPECS_URL}/billing.yaml`, ['/v1/customers']);
    expect(spec.paths[0].operations.POST?.id).toBe('PostCustomers');
  });

  it('should serve the second load from the cache', async () => {
    const source = `${SPECS_URL}/weather.json`;
    await loader.loadOrBuild(source, ['/forecast', '/locations']);
    const cached = await loader.loadOrBuild(source, ['/locations', '/forecast']);

    expect(cached.paths).toHaveLength(3);
    expect(logger.info).toHaveBeenCalledWith(
      'Loading cached OpenAPI spec',
      expect.objectContaining({ source })
    );

    const text = await metrics.getMetrics();
    expect(text).toContain('mcp_spec_loads_total{outcome="built"} 1');
    expect(text).toContain('mcp_spec_loads_total{outcome="cache_hit"} 1');
  });

  it('should bypass the cache entirely when useCache is false', async () => {
    const source = `${SPECS_URL}/weather.json`;
    await loader.loadOrBuild(source, ['/forecast'], { useCache: false });

    expect(backend.size).toBe(0);
  });

  it('should not read a stale entry when useCache is false', async () => {
    const source = `${SPECS_URL}/weather.json`;
    await backend.put(cacheKey(source, ['/forecast']), JSON.stringify({ paths: [] }));

    const spec = await loader.loadOrBuild(source, ['/forecast'], { useCache: false });
    expect(spec.paths).toHaveLength(2);
  });

  it('should return a deeply frozen spec', async () => {
    const spec = await loader.loadOrBuild(`${SPECS_URL}/weather.json`, ['/forecast$']);

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.paths[0].operations.GET?.parameters)).toBe(true);
  });

  it('should fail the whole load for an unreachable source', async () => {
    await expect(loader.loadOrBuild(`${SPECS_URL}/missing.json`, ['/'])).rejects.toThrow(SpecLoadError);
    expect(await metrics.getMetrics()).toContain('mcp_spec_loads_total{outcome="failed"} 1');
    expect(backend.size).toBe(0);
  });

  it('should keep going when the cache cannot be written', async () => {
    const failing = new SpecLoader({
      logger,
      cache: new SpecCache({
        get: async () => undefined,
        put: async () => {
          throw new Error('disk full');
        },
      }, logger),
    });

    const spec = await failing.loadOrBuild(`${SPECS_URL}/weather.json`, ['/forecast$']);
    expect(spec.paths).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('Spec cache write failed', expect.objectContaining({ reason: 'disk full' }));
  });
});
