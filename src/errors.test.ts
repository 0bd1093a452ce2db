/**
 * Tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  MCPError,
  SpecLoadError,
  ToolNotFoundError,
  generateCorrelationId,
  getErrorDetails,
  isMCPError,
  toError,
} from './errors.js';

describe('generateCorrelationId', () => {
  it('should generate a valid UUID v4 format', () => {
    const id = generateCorrelationId();
    
    // UUID v4 format: xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
    const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
    expect(id).toMatch(uuidRegex);
  });

  it('should generate unique IDs', () => {
    const ids = new Set<string>();
    
    // Generate 100 IDs and check for uniqueness
    for (let i = 0; i < 100; i++) {
      const id = generateCorrelationId();
      expect(ids.has(id)).toBe(false);
      ids.add(id);
    }
    
    expect(ids.size).toBe(100);
  });

  it('should have correct version (4) in UUID', () => {
    const id = generateCorrelationId();
    const parts = id.split('-');
    
    // Version should be 4 (first character of third group)
    expect(parts[2][0]).toBe('4');
  });

  it('should have correct variant in UUID', () => {
    const id = generateCorrelationId();
    const parts = id.split('-');
    
    // Variant should be 8, 9, a, or b (first character of fourth group)
    expect(['8', '9', 'a', 'b']).toContain(parts[3][0]);
  });
});


describe('error types', () => {
  it('should carry code and details', () => {
    const error = new SpecLoadError('https://specs.example.com/weather.json', 'HTTP 404');

    expect(error).toBeInstanceOf(MCPError);
    expect(error.name).toBe('SpecLoadError');
    expect(error.code).toBe('SPEC_LOAD_ERROR');
    expect(error.message).toBe('Failed to load OpenAPI spec from https://specs.example.com/weather.json: HTTP 404');
    expect(error.details).toEqual({ source: 'https://specs.example.com/weather.json', reason: 'HTTP 404' });
  });

  it('should keep the cause of a load failure', () => {
    const cause = new Error('ENOENT');
    expect(new SpecLoadError('weather.json', 'not found', cause).cause).toBe(cause);
  });

  it('should recognize MCP errors', () => {
    expect(isMCPError(new ToolNotFoundError('get_forecast'))).toBe(true);
    expect(isMCPError(new Error('plain'))).toBe(false);
  });
});

describe('getErrorDetails', () => {
  it('should include code and details of MCP errors', () => {
    const details = getErrorDetails(new ConfigurationError("Duplicate namespace 'weather'", { namespace: 'weather' }));

    expect(details).toMatchObject({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
      message: "Duplicate namespace 'weather'",
      details: { namespace: 'weather' },
    });
  });

  it('should stringify non-errors', () => {
    expect(getErrorDetails('boom')).toEqual({ message: 'boom' });
  });
});

describe('toError', () => {
  it('should pass errors through and wrap other values', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
