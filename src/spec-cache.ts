/**
 * Resolved spec cache
 *
 * Resolution is the expensive part of a load, so built specs are persisted
 * under a key derived from the source and its route patterns. The cache is
 * an optimization only: an unreadable or invalid entry is a miss.
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import type { Logger } from './logger.js';
import { BODY_CONTENT_TYPES, type Schema, type Spec } from './types/spec.js';
import { isRecord } from './validation-utils.js';

/**
 * MD5 of `"<source>:<patterns sorted and joined by ,>"`; pattern order does
 * not affect the key.
 */
export function cacheKey(source: string, routePatterns: readonly string[]): string {
  const patterns = [...routePatterns].sort().join(',');
  return crypto.createHash('md5').update(`${source}:${patterns}`).digest('hex');
}

export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, data: string): Promise<void>;
}

export function defaultCacheDir(): string {
  return process.env.MCP_OPENAPI_CACHE_DIR || path.join(os.homedir(), DEFAULTS.CACHE_DIR_NAME, 'cache');
}

/**
 * One `<key>.json` file per entry
 */
export class FileCacheStore implements CacheStore {
  constructor(readonly directory: string = defaultCacheDir()) {}

  async get(key: string): Promise<string | undefined> {
    try {
      return await fs.readFile(this.entryPath(key), 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') return undefined;
      throw error;
    }
  }

  /**
   * Written to a temporary file and renamed, so concurrent readers never see
   * a partial entry.
   */
  async put(key: string, data: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = this.entryPath(key);
    const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(temporary, data, 'utf-8');
    await fs.rename(temporary, target);
  }

  entryPath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, data: string): Promise<void> {
    this.entries.set(key, data);
  }

  get size(): number {
    return this.entries.size;
  }
}

const schemaNodeSchema: z.ZodType<Schema> = z.lazy(() => z.object({
  name: z.string(),
  type: z.union([z.string(), z.array(z.string())]),
  description: z.string().optional(),
  properties: z.array(schemaNodeSchema),
  items: schemaNodeSchema.optional(),
  anyOf: z.array(schemaNodeSchema).optional(),
  allOf: z.array(schemaNodeSchema).optional(),
}));

const parameterSchema = z.object({
  name: z.string(),
  location: z.enum(['query', 'path', 'header']),
  required: z.boolean(),
  type: z.string(),
  items: z.string().optional(),
  variants: z.array(z.string()).optional(),
  enum: z.array(z.unknown()).optional(),
  default: z.unknown().optional(),
  description: z.string().optional(),
  style: z.string().optional(),
  explode: z.boolean().optional(),
});

const requestBodySchema = z.object({
  required: z.boolean(),
  contentType: z.enum(BODY_CONTENT_TYPES),
  description: z.string().optional(),
  schema: schemaNodeSchema.optional(),
  encoding: z.record(z.string(), z.object({
    explode: z.boolean().optional(),
    style: z.string().optional(),
    allowReserved: z.boolean().optional(),
    contentType: z.string().optional(),
  })).optional(),
});

const responseSchema = z.object({
  description: z.string(),
  schema: schemaNodeSchema.optional(),
  format: z.enum(['application/json', 'text/plain']),
});

const operationSchema = z.object({
  id: z.string(),
  summary: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(parameterSchema),
  requestBody: requestBodySchema.optional(),
  responses: z.record(z.string(), responseSchema),
});

export const specSchema: z.ZodType<Spec> = z.object({
  paths: z.array(z.object({
    path: z.string(),
    operations: z.object({
      GET: operationSchema.optional(),
      POST: operationSchema.optional(),
      PUT: operationSchema.optional(),
      DELETE: operationSchema.optional(),
      PATCH: operationSchema.optional(),
    }),
  })),
  baseUrl: z.string().optional(),
});

export class SpecCache {
  constructor(
    private readonly backend: CacheStore,
    private readonly logger: Logger
  ) {}

  async lookup(key: string): Promise<Spec | undefined> {
    const raw = await this.backend.get(key);
    if (raw === undefined) return undefined;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Ignoring unreadable spec cache entry', {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const result = specSchema.safeParse(data);
    if (!result.success) {
      this.logger.warn('Ignoring invalid spec cache entry', {
        key,
        issues: result.error.issues.length,
      });
      return undefined;
    }
    return result.data;
  }

  async store(key: string, spec: Spec): Promise<void> {
    await this.backend.put(key, JSON.stringify(spec));
  }
}
