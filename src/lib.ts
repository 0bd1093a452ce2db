/**
 * Library exports for programmatic usage
 */
export { SchemaResolver } from './schema-resolver.js';
export { OperationExtractor, buildSpec, extractPaths } from './operation-extractor.js';
export { compileTool, formatToolType, toolsFromSpec } from './tool-compiler.js';
export { SpecCache, FileCacheStore, MemoryCacheStore, cacheKey } from './spec-cache.js';
export { SpecLoader } from './spec-loader.js';
export { buildToolRequest } from './request-builder.js';
export { ApiProxy } from './proxy.js';
export { CassetteRecorder } from './recorder.js';
export { ToolGenerator } from './tool-generator.js';
export { ToolInvoker, createMcpServer } from './mcp-server.js';
export { ServerManager } from './server-manager.js';
export { formatSpec, formatTools } from './spec-format.js';
export { ConsoleLogger, JsonLogger, createLogger } from './logger.js';
export type { Logger } from './logger.js';
export type { Spec, Path, Operation, Parameter, RequestBody, Response, Schema } from './types/spec.js';
export type { Tool, ToolParameter, ToolType } from './types/tool.js';
export type { ServerConfig, ServersFile } from './types/config.js';
