/**
 * Command line interface
 *
 * Usage:
 *   openapi-tool-gateway serve --config servers.yaml
 *   openapi-tool-gateway parse --file openapi.yaml --routes '/users'
 *   openapi-tool-gateway tools --url https://example.com/openapi.json --routes '/users' '/teams'
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadServersConfig, redactionFor } from './config-loader.js';
import { DEFAULTS, SERVER_INFO } from './constants.js';
import { toError } from './errors.js';
import { ConfigWatcher } from './file-watcher.js';
import { createLogger, type Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import { ServerManager } from './server-manager.js';
import { FileCacheStore, SpecCache, defaultCacheDir } from './spec-cache.js';
import { formatSpec, formatTools } from './spec-format.js';
import { SpecLoader, type FetchFn } from './spec-loader.js';
import { toolsFromSpec } from './tool-compiler.js';
import type { Spec } from './types/spec.js';

/**
 * Where the commands write. Tests substitute their own.
 */
export interface CliIO {
  /** Command output (stdout) */
  out: (text: string) => void;
  /** One-line usage error; the process exits non-zero */
  fail: (message: string) => void;
  logger?: Logger;
  fetch?: FetchFn;
  cacheDir?: string;
}

interface SourceOptions {
  file?: string;
  url?: string;
  routes: string[];
  useCache?: boolean;
}

interface ToolsOptions extends SourceOptions {
  forwardQueryParams?: string[];
}

interface ServeOptions {
  config: string;
  host: string;
  port: number;
  watch: boolean;
}

export const processIO: CliIO = {
  out: text => console.log(text),
  fail: message => {
    console.error(message);
    process.exitCode = 1;
  },
};

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

/**
 * Exactly one of --file and --url
 */
export function sourceFromOptions(options: SourceOptions): { source: string } | { error: string } {
  if (options.file && options.url) {
    return { error: 'Error: Cannot specify both --file and --url' };
  }
  const source = options.file ?? options.url;
  if (!source) {
    return { error: 'Error: Must specify either --file or --url' };
  }
  return { source };
}

async function loadSpec(io: CliIO, options: SourceOptions): Promise<Spec | undefined> {
  const resolved = sourceFromOptions(options);
  if ('error' in resolved) {
    io.fail(resolved.error);
    return undefined;
  }

  const logger = io.logger ?? createLogger();
  const cache = new SpecCache(new FileCacheStore(io.cacheDir ?? defaultCacheDir()), logger);
  const loader = new SpecLoader({ logger, cache, fetch: io.fetch });
  return loader.loadOrBuild(resolved.source, options.routes, { useCache: options.useCache ?? false });
}

function addSourceOptions(command: Command): Command {
  return command
    .option('--file <path>', 'Path to OpenAPI document')
    .option('--url <url>', 'URL of OpenAPI document')
    .requiredOption('--routes <patterns...>', 'Route patterns to include (regular expressions)');
}

async function serve(options: ServeOptions): Promise<void> {
  const config = await loadServersConfig(options.config);
  const logger = createLogger(undefined, redactionFor(config));
  const metrics = process.env.METRICS_ENABLED === 'true' ? new MetricsCollector({ enabled: true }) : undefined;
  const specLoader = new SpecLoader({
    logger,
    metrics,
    cache: new SpecCache(new FileCacheStore(defaultCacheDir()), logger),
  });

  const manager = new ServerManager({
    configPath: options.config,
    logger,
    specLoader,
    metrics,
  });
  await manager.reload();
  await manager.listen({ host: options.host, port: options.port });

  const watcher = options.watch ? new ConfigWatcher(options.config, () => manager.reload(), logger) : undefined;
  watcher?.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    watcher?.stop();
    manager.close()
      .then(() => {
        logger.info('Server stopped successfully');
        process.exit(0);
      })
      .catch(error => {
        logger.error('Error during shutdown', toError(error));
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('openapi-tool-gateway')
    .description('Serve OpenAPI operations as MCP tools')
    .version(SERVER_INFO.VERSION);

  program.command('serve')
    .description('Start the MCP server for every API in the config file')
    .option('-c, --config <path>', 'Server config file', process.env.CONFIG_PATH ?? DEFAULTS.CONFIG_PATH)
    .option('--host <host>', 'Interface to bind', process.env.HOST ?? DEFAULTS.HOST)
    .option('--port <port>', 'Port to listen on', parsePort, process.env.PORT ? parsePort(process.env.PORT) : DEFAULTS.PORT)
    .option('--no-watch', 'Do not reload when the config file changes')
    .action(async (options: ServeOptions) => {
      await serve(options);
    });

  addSourceOptions(program.command('parse'))
    .description('Print the resolved operations of an OpenAPI document')
    .option('--use-cache', 'Read and write the spec cache', false)
    .action(async (options: SourceOptions) => {
      const spec = await loadSpec(io, options);
      if (spec) {
        io.out(formatSpec(spec));
      }
    });

  addSourceOptions(program.command('tools'))
    .description('Print the tools compiled from an OpenAPI document')
    .option('--forward-query-params <names...>', 'Parameters supplied by the proxy, left out of the tools')
    .action(async (options: ToolsOptions) => {
      const spec = await loadSpec(io, options);
      if (spec) {
        io.out(formatTools(toolsFromSpec(spec, options.forwardQueryParams ?? [])));
      }
    });

  return program;
}
