/**
 * Tests for tool invocation and the MCP server wiring
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, beforeEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ConfigurationError, NetworkError, ToolNotFoundError, UpstreamTimeoutError, ValidationError } from './errors.js';
import { ToolInvoker, createMcpServer, formatErrorForClient, uniqueTools, type ToolSet } from './mcp-server.js';
import { MetricsCollector } from './metrics.js';
import { buildSpec } from './operation-extractor.js';
import { ApiProxy } from './proxy.js';
import { toolsFromSpec } from './tool-compiler.js';
import { ToolGenerator } from './tool-generator.js';
import { WEATHER_URL, resetMockServer, startMockServer, stopMockServer, type EchoResponse } from './testing/mock-api-server.js';
import { createMockLogger } from './testing/mock-logger.js';
import { weatherDocument } from './testing/fixtures.js';
import type { Logger } from './logger.js';
import type { Tool } from './types/tool.js';

beforeAll(() => startMockServer());
afterEach(() => resetMockServer());
afterAll(() => stopMockServer());

function weatherToolSet(logger: Logger, baseUrl = WEATHER_URL): ToolSet {
  return {
    namespace: 'weather',
    name: 'Weather',
    baseUrl,
    tools: toolsFromSpec(buildSpec(weatherDocument, ['/forecast$', '/locations']), ['X-Api-Key']),
    proxy: new ApiProxy({ logger, forwardQueryParams: { 'x-api-key': 'api_key' } }),
  };
}

function firstText(result: { content: Array<{ type: 'text'; text: string }> }): string {
  return result.content[0].text;
}

describe('formatErrorForClient', () => {
  const id = 'test-correlation-id';

  it('should show input and configuration errors', () => {
    expect(formatErrorForClient(new ValidationError('bad input'), id))
      .toBe('Validation error: bad input (correlation ID: test-correlation-id)');
    expect(formatErrorForClient(new ToolNotFoundError('nope'), id))
      .toBe('Tool not found: nope (correlation ID: test-correlation-id)');
    expect(formatErrorForClient(new ConfigurationError('no base URL'), id))
      .toBe('Configuration error: no base URL (correlation ID: test-correlation-id)');
  });

  it('should show upstream failures', () => {
    expect(formatErrorForClient(new UpstreamTimeoutError('https://api.example.com/x', 50), id))
      .toBe('Upstream timeout: Request to https://api.example.com/x timed out after 50ms (correlation ID: test-correlation-id)');
    expect(formatErrorForClient(new NetworkError('connection refused'), id))
      .toBe('Request failed: connection refused (correlation ID: test-correlation-id)');
  });

  it('should hide unexpected errors', () => {
    expect(formatErrorForClient(new Error('secret internals'), id))
      .toBe('Internal error (correlation ID: test-correlation-id)');
  });
});

describe('uniqueTools', () => {
  it('should keep the first tool of a name and warn about the rest', () => {
    const logger = createMockLogger();
    const [forecast] = weatherToolSet(logger).tools;
    const clash: Tool = { ...forecast, method: 'POST', path: '/broken' };

    expect(uniqueTools([forecast, clash], logger, 'weather')).toEqual([forecast]);
    expect(logger.warn).toHaveBeenCalledWith('Duplicate tool name, keeping the first', {
      namespace: 'weather',
      tool: 'get_forecast',
      kept: 'GET /forecast',
      dropped: 'POST /broken',
    });
  });
});

describe('ToolInvoker', () => {
  let logger: Logger;
  let metrics: MetricsCollector;
  let invoker: ToolInvoker;

  beforeEach(() => {
    logger = createMockLogger();
    metrics = new MetricsCollector({ enabled: true });
    invoker = new ToolInvoker(weatherToolSet(logger), new ToolGenerator(), logger, metrics);
  });

  it('should list MCP tools', () => {
    expect(invoker.listTools().map(tool => tool.name)).toEqual(['get_forecast', 'get_location', 'update_location']);
  });

  it('should call the upstream API and return the raw body', async () => {
    const result = await invoker.callTool(
      'get_forecast',
      { latitude: 52.52, longitude: 13.41 },
      { 'x-api-key': 'test-secret' }
    );

    expect(result.isError).toBeUndefined();
    const echo: EchoResponse = JSON.parse(firstText(result));
    expect(echo.path).toBe('/v1/forecast');
    expect(echo.query).toEqual([
      ['wind_speed_unit', 'kmh'],
      ['timeformat', 'iso8601'],
      ['temperature_unit', 'celsius'],
      ['longitude', '13.41'],
      ['latitude', '52.52'],
      ['api_key', 'test-secret'],
    ]);
    expect(await metrics.getMetrics()).toContain(
      'mcp_tool_calls_total{namespace="weather",tool="get_forecast",status="success"} 1'
    );
  });

  it('should return upstream error statuses as error results', async () => {
    const toolSet = weatherToolSet(logger);
    const broken = new ToolInvoker(
      { ...toolSet, tools: toolSet.tools.map(tool => ({ ...tool, path: '/broken' })) },
      new ToolGenerator(),
      logger
    );

    const result = await broken.callTool('get_forecast', { latitude: 1, longitude: 2 });

    expect(result).toEqual({ content: [{ type: 'text', text: 'upstream unavailable' }], isError: true });
    expect(logger.warn).toHaveBeenCalledWith(
      'Upstream returned an error status',
      { namespace: 'weather', tool: 'get_forecast', status: 503 }
    );
  });

  it('should list and call the same tool when names clash', async () => {
    const toolSet = weatherToolSet(logger);
    const [forecast] = toolSet.tools;
    const clashing = new ToolInvoker(
      { ...toolSet, tools: [forecast, { ...forecast, path: '/broken' }] },
      new ToolGenerator(),
      logger
    );

    expect(clashing.listTools().map(tool => tool.name)).toEqual(['get_forecast']);
    const result = await clashing.callTool('get_forecast', { latitude: 1, longitude: 2 });
    expect(result.isError).toBeUndefined();
    const echo: EchoResponse = JSON.parse(firstText(result));
    expect(echo.path).toBe('/v1/forecast');
  });

  it('should report an unknown tool', async () => {
    const result = await invoker.callTool('delete_everything');

    expect(result.isError).toBe(true);
    expect(firstText(result)).toMatch(/^Tool not found: delete_everything \(correlation ID: [0-9a-f-]{36}\)$/);
    expect(await metrics.getMetrics()).toContain(
      'mcp_tool_call_errors_total{namespace="weather",tool="delete_everything",error_type="TOOL_NOT_FOUND"} 1'
    );
  });

  it('should report invalid arguments without calling upstream', async () => {
    const result = await invoker.callTool('get_forecast', { latitude: 'north' });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toMatch(/^Validation error: Invalid arguments for get_forecast: /);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should report a missing path parameter', async () => {
    const result = await invoker.callTool('get_location', {});

    expect(result.isError).toBe(true);
    expect(firstText(result)).toMatch(/^Validation error: /);
  });
});

describe('createMcpServer', () => {
  it('should serve tools/list and tools/call to an MCP client', async () => {
    const logger = createMockLogger();
    const invoker = new ToolInvoker(weatherToolSet(logger), new ToolGenerator(), logger);
    const server = createMcpServer(invoker, { 'x-api-key': 'test-secret' });
    const client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    try {
      const { tools } = await client.listTools();
      const forecast = tools.find(tool => tool.name === 'get_forecast');
      expect(forecast?.inputSchema.required).toEqual(['longitude', 'latitude']);

      const result = await client.callTool({
        name: 'get_location',
        arguments: { location_id: 'berlin' },
      });
      expect(result.isError).not.toBe(true);
      expect(result.content).toEqual([{ type: 'text', text: expect.stringContaining('"path":"/v1/locations/berlin"') }]);
    } finally {
      await client.close();
      await server.close();
    }
  });
});
