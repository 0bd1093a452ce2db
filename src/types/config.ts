/**
 * Server configuration types
 *
 * `servers.yaml` lists the APIs to expose. Each entry becomes one MCP
 * namespace served at `/<namespace>/mcp`.
 */

import { z } from 'zod';

export const arrayFormatSchema = z.enum(['brackets', 'indices', 'repeat', 'comma']);

export const serverConfigSchema = z.object({
  namespace: z.string().regex(/^[A-Za-z0-9_-]+$/, 'namespace may only contain letters, digits, "_" and "-"'),
  name: z.string().min(1),
  /** OpenAPI document: http(s) URL, file:// URI or path relative to the config file */
  url: z.string().min(1),
  /** Upstream API base URL; defaults to the document's first server */
  base_url: z.string().optional(),
  /** Route patterns (regular expressions, matched from the start of the path) */
  paths: z.array(z.string()).min(1),
  /** Incoming headers forwarded to the upstream API */
  headers: z.array(z.string()).default([]),
  /** Incoming header name -> upstream query parameter name */
  forward_query_params: z.record(z.string(), z.string()).default({}),
  timeout_ms: z.number().int().positive().optional(),
  use_cache: z.boolean().default(true),
  record: z.boolean().default(false),
  array_format: arrayFormatSchema.optional(),
});

export const serversFileSchema = z.object({
  servers: z.array(serverConfigSchema),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServersFile = z.infer<typeof serversFileSchema>;
