/**
 * Server manager
 *
 * Builds one ToolSet per configured namespace and serves them all from a
 * single Express app. Reloads build the complete new set first and then
 * replace the old one in a single assignment; requests already running keep
 * the snapshot they started with.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import path from 'path';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { excludedParams, loadServersConfig, resolveSource } from './config-loader.js';
import { DEFAULTS, HTTP_STATUS } from './constants.js';
import { ConfigurationError, generateCorrelationId, toError } from './errors.js';
import type { Logger } from './logger.js';
import { ToolInvoker, createMcpServer, uniqueTools, type ToolSet } from './mcp-server.js';
import type { MetricsCollector } from './metrics.js';
import { ApiProxy } from './proxy.js';
import { CassetteRecorder } from './recorder.js';
import type { FetchFn, SpecLoader } from './spec-loader.js';
import { formatToolType, toolsFromSpec } from './tool-compiler.js';
import { ToolGenerator } from './tool-generator.js';
import type { ServerConfig } from './types/config.js';

export interface ServerManagerOptions {
  configPath: string;
  logger: Logger;
  specLoader: SpecLoader;
  metrics?: MetricsCollector;
  /** Upstream fetch for every namespace's proxy */
  fetch?: FetchFn;
  /** Cassettes are written to `<cassetteRoot>/<namespace>` */
  cassetteRoot?: string;
}

export interface ListenOptions {
  host: string;
  port: number;
}

function jsonRpcError(code: number, message: string): Record<string, unknown> {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

export class ServerManager {
  private toolSets = new Map<string, ToolSet>();
  private pending: Promise<void> = Promise.resolve();
  private readonly generator = new ToolGenerator();
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private httpServer?: HttpServer;

  constructor(private readonly options: ServerManagerOptions) {
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  /**
   * Re-read the config and rebuild every namespace. A namespace that fails to
   * build is logged and left out; an unreadable or invalid config file
   * rejects and keeps the current set. Reloads never overlap.
   */
  reload(): Promise<void> {
    const run = this.pending.then(() => this.rebuild());
    this.pending = run.catch(() => undefined);
    return run;
  }

  private async rebuild(): Promise<void> {
    const config = await loadServersConfig(this.options.configPath);
    const next = new Map<string, ToolSet>();

    for (const server of config.servers) {
      this.logger.info(`Starting server for ${server.name} (${server.namespace})`);
      try {
        next.set(server.namespace, await this.buildToolSet(server));
      } catch (error) {
        this.logger.error(`Failed to start server for ${server.name}`, toError(error), {
          namespace: server.namespace,
        });
      }
    }

    this.toolSets = next;
    this.logger.info('Servers loaded', { namespaces: [...next.keys()] });
  }

  private async buildToolSet(server: ServerConfig): Promise<ToolSet> {
    const configDir = path.dirname(path.resolve(this.options.configPath));
    const source = resolveSource(server.url, configDir);
    const spec = await this.options.specLoader.loadOrBuild(source, server.paths, { useCache: server.use_cache });

    const baseUrl = server.base_url ?? spec.baseUrl;
    if (!baseUrl) {
      throw new ConfigurationError(
        `No base_url configured for '${server.namespace}' and the document declares no servers`,
        { namespace: server.namespace }
      );
    }

    const compiled = toolsFromSpec(spec, excludedParams(server));
    const tools = Object.freeze(uniqueTools(compiled, this.logger, server.namespace));
    for (const tool of tools) {
      this.logger.debug(`${server.name} - tool: ${tool.name} - ${tool.description}`);
    }

    const recorder = server.record
      ? new CassetteRecorder(this.logger, path.join(this.options.cassetteRoot ?? DEFAULTS.CASSETTE_DIR, server.namespace))
      : undefined;

    const proxy = new ApiProxy({
      logger: this.logger,
      forwardHeaders: server.headers,
      forwardQueryParams: server.forward_query_params,
      timeoutMs: server.timeout_ms,
      arrayFormat: server.array_format,
      fetch: this.options.fetch,
      recorder,
      metrics: this.metrics,
    });

    this.logger.info(`Started server for ${server.name} (${server.namespace})`, { tools: tools.length, baseUrl });
    return { namespace: server.namespace, name: server.name, baseUrl, tools, proxy };
  }

  namespaces(): string[] {
    return [...this.toolSets.keys()];
  }

  getToolSet(namespace: string): ToolSet | undefined {
    return this.toolSets.get(namespace);
  }

  createApp(): express.Application {
    const app = express();
    app.use(express.json());

    if (this.metrics) {
      const metrics = this.metrics;
      app.use((req: Request, res: Response, next: NextFunction) => {
        const startTime = Date.now();
        res.on('finish', () => {
          metrics.recordHttpRequest(req.method, req.path, res.statusCode, (Date.now() - startTime) / 1000);
        });
        next();
      });
    }

    app.post('/:namespace/mcp', (req: Request, res: Response) => {
      this.handleMcpPost(req, res).catch(error => {
        const correlationId = generateCorrelationId();
        this.logger.error('MCP request failed', toError(error), { correlationId, namespace: req.params.namespace });
        if (!res.headersSent) {
          res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR)
            .json(jsonRpcError(-32603, `Internal error (correlation ID: ${correlationId})`));
        }
      });
    });

    // Stateless transport: no SSE stream to open, no session to delete
    const methodNotAllowed = (_req: Request, res: Response) => {
      res.status(HTTP_STATUS.METHOD_NOT_ALLOWED).json(jsonRpcError(-32000, 'Method not allowed.'));
    };
    app.get('/:namespace/mcp', methodNotAllowed);
    app.delete('/:namespace/mcp', methodNotAllowed);

    app.get('/tools', (_req: Request, res: Response) => {
      const byNamespace: Record<string, unknown[]> = {};
      for (const [namespace, toolSet] of this.toolSets) {
        byNamespace[namespace] = toolSet.tools.map(tool => ({
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters.map(param => ({
            name: param.name,
            type: formatToolType(param.type),
            default: param.default ?? null,
            description: param.description,
          })),
        }));
      }
      res.json(byNamespace);
    });

    app.get('/tools/:namespace', (req: Request, res: Response) => {
      const toolSet = this.toolSets.get(req.params.namespace);
      if (!toolSet) {
        res.status(HTTP_STATUS.NOT_FOUND).json({ error: `Namespace '${req.params.namespace}' not found` });
        return;
      }
      res.json(toolSet.tools.map(tool => ({ name: tool.name, description: tool.description })));
    });

    app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', namespaces: this.namespaces() });
    });

    if (this.metrics) {
      const metrics = this.metrics;
      app.get('/metrics', (_req: Request, res: Response) => {
        metrics.getMetrics()
          .then(body => {
            res.set('Content-Type', metrics.getContentType());
            res.send(body);
          })
          .catch(error => {
            this.logger.error('Metrics endpoint error', toError(error));
            res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'Internal Server Error' });
          });
      });
    }

    return app;
  }

  /**
   * One SDK server and transport per request, bound to the snapshot current
   * when the request arrived.
   */
  private async handleMcpPost(req: Request, res: Response): Promise<void> {
    const toolSet = this.toolSets.get(req.params.namespace);
    if (!toolSet) {
      res.status(HTTP_STATUS.NOT_FOUND).json(jsonRpcError(-32601, `Namespace '${req.params.namespace}' not found`));
      return;
    }

    const invoker = new ToolInvoker(toolSet, this.generator, this.logger, this.metrics);
    const server = createMcpServer(invoker, req.headers);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      transport.close().catch(error => this.logger.error('Transport close failed', toError(error)));
      server.close().catch(error => this.logger.error('Server close failed', toError(error)));
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  }

  async listen(options: ListenOptions): Promise<HttpServer> {
    const app = this.createApp();
    return new Promise((resolve, reject) => {
      const server = app.listen(options.port, options.host, () => {
        this.logger.info('HTTP server started', { host: options.host, port: options.port });
        resolve(server);
      });
      server.on('error', reject);
      this.httpServer = server;
    });
  }

  async close(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;

    return new Promise((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
        } else {
          this.logger.info('HTTP server stopped');
          resolve();
        }
      });
    });
  }
}
