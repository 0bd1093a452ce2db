/**
 * MCP server wiring
 *
 * ToolInvoker executes tool calls for one namespace snapshot; createMcpServer
 * binds an invoker to an SDK Server for a single transport connection.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import { SERVER_INFO } from './constants.js';
import {
  ConfigurationError,
  NetworkError,
  ToolNotFoundError,
  UpstreamTimeoutError,
  ValidationError,
  generateCorrelationId,
  isMCPError,
  toError,
} from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { isSuccessStatus, type ApiProxy, type IncomingHeaders } from './proxy.js';
import { buildToolRequest } from './request-builder.js';
import type { ToolGenerator } from './tool-generator.js';
import type { Tool } from './types/tool.js';

/**
 * Everything needed to serve one namespace. Built completely before it is
 * published, never modified afterwards.
 */
export interface ToolSet {
  namespace: string;
  name: string;
  baseUrl: string;
  tools: readonly Tool[];
  proxy: ApiProxy;
}

export interface ToolCallResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Format error message for client with correlation ID
 *
 * Input and configuration problems are shown as-is; anything unexpected is
 * reduced to the correlation ID so internals stay in the server log.
 */
export function formatErrorForClient(error: unknown, correlationId: string): string {
  const suffix = `(correlation ID: ${correlationId})`;

  if (error instanceof ValidationError) {
    return `Validation error: ${error.message} ${suffix}`;
  }
  if (error instanceof ToolNotFoundError) {
    return `${error.message} ${suffix}`;
  }
  if (error instanceof UpstreamTimeoutError) {
    return `Upstream timeout: ${error.message} ${suffix}`;
  }
  if (error instanceof NetworkError) {
    return `Request failed: ${error.message} ${suffix}`;
  }
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message} ${suffix}`;
  }
  return `Internal error ${suffix}`;
}

/**
 * Drop tools whose name is already taken; the first one wins. Two operations
 * compile to one name when, say, GET and POST share a path and neither has
 * an operationId.
 */
export function uniqueTools(tools: readonly Tool[], logger: Logger, namespace: string): Tool[] {
  const byName = new Map<string, Tool>();
  for (const tool of tools) {
    const kept = byName.get(tool.name);
    if (kept) {
      logger.warn('Duplicate tool name, keeping the first', {
        namespace,
        tool: tool.name,
        kept: `${kept.method} ${kept.path}`,
        dropped: `${tool.method} ${tool.path}`,
      });
      continue;
    }
    byName.set(tool.name, tool);
  }
  return [...byName.values()];
}

export class ToolInvoker {
  private readonly tools: readonly Tool[];
  private readonly byName: Map<string, Tool>;

  constructor(
    readonly toolSet: ToolSet,
    private readonly generator: ToolGenerator,
    private readonly logger: Logger,
    private readonly metrics?: MetricsCollector
  ) {
    this.tools = uniqueTools(toolSet.tools, logger, toolSet.namespace);
    this.byName = new Map(this.tools.map(tool => [tool.name, tool]));
  }

  listTools(): McpTool[] {
    return this.tools.map(tool => this.generator.generateTool(tool));
  }

  /**
   * Execute a tool call. Never throws: upstream HTTP errors come back with
   * `isError` and the raw response body, everything else as an error text
   * carrying a correlation ID.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    headers: IncomingHeaders = {}
  ): Promise<ToolCallResult> {
    const { namespace } = this.toolSet;
    const startTime = Date.now();

    try {
      const tool = this.byName.get(name);
      if (!tool) {
        throw new ToolNotFoundError(name);
      }

      this.generator.validateArguments(tool, args);
      const request = buildToolRequest(tool, args, this.toolSet.baseUrl);
      const response = await this.toolSet.proxy.execute(request, headers);
      const ok = isSuccessStatus(response.status);

      this.metrics?.recordToolCall(namespace, name, ok ? 'success' : 'error', (Date.now() - startTime) / 1000);
      if (!ok) {
        this.logger.warn('Upstream returned an error status', { namespace, tool: name, status: response.status });
      }

      return {
        content: [{ type: 'text', text: response.body }],
        ...(ok ? {} : { isError: true }),
      };
    } catch (error) {
      const correlationId = generateCorrelationId();
      this.logger.error('CallTool handler error', toError(error), { correlationId, namespace, tool: name });
      this.metrics?.recordToolCall(namespace, name, 'error', (Date.now() - startTime) / 1000);
      this.metrics?.recordToolCallError(namespace, name, isMCPError(error) ? error.code : 'INTERNAL_ERROR');

      return {
        content: [{ type: 'text', text: formatErrorForClient(error, correlationId) }],
        isError: true,
      };
    }
  }
}

/**
 * SDK server for one connection. `headers` are the incoming HTTP request's
 * headers, consulted for forwarded headers and query parameters.
 */
export function createMcpServer(invoker: ToolInvoker, headers: IncomingHeaders = {}): Server {
  const server = new Server(
    {
      name: SERVER_INFO.NAME,
      version: SERVER_INFO.VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: invoker.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    invoker.callTool(request.params.name, request.params.arguments ?? {}, headers)
  );

  return server;
}
