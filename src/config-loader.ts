/**
 * Server configuration loader and validator
 *
 * The config comes from a user-edited file and is re-read on every change,
 * so it is validated completely before anything is built from it.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from './errors.js';
import type { RedactionConfig } from './logger.js';
import { compileRoutePatterns } from './operation-extractor.js';
import { serversFileSchema, type ServerConfig, type ServersFile } from './types/config.js';
import { isHttpUrl } from './validation-utils.js';

export async function loadServersConfig(configPath: string): Promise<ServersFile> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${configPath}`, {
      configPath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${configPath} is not valid YAML`, {
      configPath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return parseServersConfig(data, configPath);
}

/**
 * Validate parsed config data
 */
export function parseServersConfig(data: unknown, configPath = '<inline>'): ServersFile {
  const result = serversFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file ${configPath}: ${issues.join('; ')}`, { configPath, issues });
  }

  validateLogic(result.data);
  return result.data;
}

/**
 * Rules the schema cannot express
 */
function validateLogic(config: ServersFile): void {
  const seen = new Set<string>();
  for (const server of config.servers) {
    if (seen.has(server.namespace)) {
      throw new ConfigurationError(`Duplicate namespace '${server.namespace}'`, { namespace: server.namespace });
    }
    seen.add(server.namespace);

    compileRoutePatterns(server.paths);
  }
}

/**
 * Names the proxy fills in by itself and that are therefore left out of the
 * tool signatures: forwarded headers and forwarded query parameters.
 */
export function excludedParams(server: ServerConfig): string[] {
  return [...server.headers, ...Object.values(server.forward_query_params)];
}

/**
 * Spec source for a server entry. URLs and absolute `file://` URIs are kept;
 * `file://relative/path` and bare paths resolve against the config directory.
 */
export function resolveSource(url: string, configDir: string): string {
  if (isHttpUrl(url) || url.startsWith('file:///')) return url;
  const filePath = url.startsWith('file://') ? url.slice('file://'.length) : url;
  return path.resolve(configDir, filePath);
}

/**
 * Forwarded header and query parameter names across all servers; their
 * values are the callers' credentials and must not reach the log.
 */
export function redactionFor(config: ServersFile): RedactionConfig {
  return {
    headers: config.servers.flatMap(server => server.headers),
    queryParams: config.servers.flatMap(server => Object.values(server.forward_query_params)),
  };
}
