/**
 * OpenAPI documents shared by the unit tests
 */

import type { OpenAPIV3 } from 'openapi-types';

export const weatherDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Weather', version: '1.0.0' },
  servers: [{ url: 'https://weather.example.com/v1' }],
  paths: {
    '/forecast': {
      get: {
        operationId: 'getForecast',
        summary: 'Get the weather forecast',
        parameters: [
          { name: 'latitude', in: 'query', required: true, description: 'Latitude of the location', schema: { type: 'number' } },
          { name: 'longitude', in: 'query', required: true, description: 'Longitude of the location', schema: { type: 'number' } },
          {
            name: 'temperature_unit',
            in: 'query',
            description: 'Temperature unit.',
            schema: { type: 'string', enum: ['celsius', 'fahrenheit'], default: 'celsius' },
          },
          {
            name: 'wind_speed_unit',
            in: 'query',
            description: 'Wind speed unit.',
            schema: { type: 'string', enum: ['kmh', 'ms', 'mph', 'kn'], default: 'kmh' },
          },
          {
            name: 'timeformat',
            in: 'query',
            schema: { type: 'string', enum: ['iso8601', 'unixtime'], default: 'iso8601' },
          },
          { name: 'field[]', in: 'query', schema: { type: 'array', items: { type: 'string' } } },
          { name: 'session', in: 'cookie', schema: { type: 'string' } },
        ],
        responses: {
          '200': {
            description: 'Forecast',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Forecast' } } },
          },
          '400': {
            description: 'Bad request',
            content: { 'text/plain': { schema: { type: 'string' } } },
          },
        },
      },
    },
    '/forecast/archive': {
      get: {
        summary: 'Historical weather',
        responses: { '200': { description: 'Archive' } },
      },
    },
    '/v2/forecast': {
      get: {
        operationId: 'getForecastV2',
        responses: { '200': { description: 'Forecast' } },
      },
    },
    '/locations/{locationId}': {
      parameters: [
        { name: 'locationId', in: 'path', required: true, schema: { type: 'string' } },
        { name: 'verbose', in: 'query', schema: { type: 'boolean' } },
      ],
      get: {
        operationId: 'getLocation',
        description: 'Fetch one saved location',
        parameters: [
          { name: 'verbose', in: 'query', description: 'Include station details', schema: { type: 'integer' } },
        ],
        responses: { '200': { description: 'Location' } },
      },
      put: {
        operationId: 'updateLocation',
        summary: 'Rename a "saved"\nlocation',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  label: { type: 'string', description: 'Display name' },
                  elevation: { type: 'integer' },
                },
              },
            },
          },
        },
        responses: { '204': { description: 'Updated' } },
      },
    },
  },
  components: {
    schemas: {
      Forecast: {
        type: 'object',
        properties: {
          latitude: { type: 'number' },
          hourly: {
            type: 'object',
            properties: {
              time: { type: 'array', items: { type: 'string' } },
            },
          },
        },
      },
    },
  },
};

/**
 * Form-encoded body with anyOf members, a nested object and an array
 */
export const customerDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Billing', version: '1.0.0' },
  servers: [{ url: 'https://billing.example.com' }],
  paths: {
    '/v1/customers': {
      post: {
        operationId: 'PostCustomers',
        summary: 'Create a customer',
        requestBody: {
          content: {
            'application/x-www-form-urlencoded': {
              schema: {
                type: 'object',
                properties: {
                  name: { type: 'string', description: "The customer's full name" },
                  address: {
                    anyOf: [
                      { $ref: '#/components/schemas/Address' },
                      { type: 'string', enum: [''] },
                    ],
                    description: 'The customer address.',
                  },
                  metadata: {
                    anyOf: [
                      { type: 'object', description: 'Set of key-value pairs' },
                      { type: 'string', enum: [''] },
                    ],
                  },
                  invoice_settings: {
                    type: 'object',
                    properties: { footer: { type: 'string' } },
                  },
                  tags: { type: 'array', items: { type: 'string' } },
                },
              },
              encoding: {
                metadata: { style: 'deepObject', explode: true },
              },
            },
            'application/json': {
              schema: { type: 'object', properties: { ignored: { type: 'string' } } },
            },
          },
        },
        responses: {
          '200': {
            description: 'Created customer',
            content: { 'application/json': { schema: { $ref: '#/components/schemas/Customer' } } },
          },
        },
      },
    },
  },
  components: {
    schemas: {
      Address: {
        type: 'object',
        properties: {
          city: { type: 'string' },
          line1: { type: 'string' },
        },
      },
      Customer: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          name: { type: 'string' },
        },
      },
    },
  },
};

/**
 * Self-referencing schema
 */
export const personDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'People', version: '1.0.0' },
  paths: {
    '/people/{id}': {
      get: {
        operationId: 'getPerson',
        parameters: [{ $ref: '#/components/parameters/PersonId' }],
        responses: { '200': { $ref: '#/components/responses/PersonResponse' } },
      },
    },
  },
  components: {
    parameters: {
      PersonId: { name: 'id', in: 'path', required: true, schema: { type: 'integer' } },
    },
    responses: {
      PersonResponse: {
        description: 'A person',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Person' } } },
      },
    },
    schemas: {
      Person: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          spouse: { $ref: '#/components/schemas/Person' },
          children: { type: 'array', items: { $ref: '#/components/schemas/Person' } },
        },
      },
      Couple: {
        type: 'object',
        properties: {
          left: { type: 'array', items: { $ref: '#/components/schemas/Person' } },
          right: { type: 'array', items: { $ref: '#/components/schemas/Person' } },
        },
      },
    },
  },
};

/**
 * allOf composition at the top level and on a body member
 */
export const petDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Pets', version: '1.0.0' },
  servers: [{ url: 'https://pets.example.com/api' }],
  paths: {
    '/pets': {
      post: {
        operationId: 'createPet',
        requestBody: {
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  owner: { type: 'string' },
                  pet: {
                    allOf: [
                      { $ref: '#/components/schemas/Base' },
                      {
                        type: 'object',
                        properties: {
                          tag: { type: 'string' },
                          color: { type: 'string', description: 'Coat color' },
                        },
                      },
                    ],
                  },
                },
              },
            },
          },
        },
        responses: { '201': { description: 'Created' } },
      },
    },
  },
  components: {
    schemas: {
      Base: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          name: { type: 'string' },
        },
      },
      Pet: {
        allOf: [
          { $ref: '#/components/schemas/Base' },
          { type: 'object', properties: { tag: { type: 'string' } } },
        ],
      },
    },
  },
};

/**
 * Self-referencing composition: an anyOf and an allOf that name their own
 * schema as a branch
 */
export const nodeDocument: OpenAPIV3.Document = {
  openapi: '3.0.3',
  info: { title: 'Nodes', version: '1.0.0' },
  servers: [{ url: 'https://graph.example.com' }],
  paths: {
    '/nodes': {
      post: {
        operationId: 'createNode',
        requestBody: {
          content: { 'application/json': { schema: { $ref: '#/components/schemas/Node' } } },
        },
        responses: { '201': { description: 'Created' } },
      },
    },
  },
  components: {
    schemas: {
      Node: {
        type: 'object',
        properties: {
          label: { type: 'string' },
          next: {
            description: 'Next node',
            anyOf: [{ $ref: '#/components/schemas/Node' }, { type: 'string' }],
          },
        },
      },
      Tree: {
        allOf: [
          { $ref: '#/components/schemas/Tree' },
          { type: 'object', properties: { size: { type: 'integer' } } },
        ],
      },
    },
  },
};
