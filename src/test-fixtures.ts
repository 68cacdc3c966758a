import type { SpecDocument } from './types.js';

/**
 * Builds a normalized document for tests; unspecified sections are empty.
 */
export function makeSpec(overrides: Partial<SpecDocument> = {}): SpecDocument {
  return {
    info: { title: 'Test API', version: '1.0.0' },
    servers: [],
    schemas: {},
    paths: {},
    parameters: {},
    requestBodies: {},
    responses: {},
    securitySchemes: {},
    ...overrides,
  };
}

/** A `Pet` schema, `GET /pets/{id}` and an API key sent in the `X-API-Key` header. */
export function petStoreSpec(): SpecDocument {
  return makeSpec({
    info: { title: 'Pet Store', version: '1.0.0' },
    servers: ['https://petstore.example.com/v1'],
    schemas: {
      Pet: {
        type: 'object',
        required: ['id', 'name'],
        properties: {
          id: { type: 'integer', format: 'int64' },
          name: { type: 'string' },
          tag: { type: 'string' },
        },
      },
    },
    paths: {
      '/pets/{id}': {
        get: {
          operationId: 'getPet',
          tags: ['pets'],
          parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'integer' } }],
          responses: {
            '200': { description: 'ok', content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } } },
            '404': { description: 'missing' },
          },
        },
      },
    },
    securitySchemes: {
      ApiKeyAuth: { type: 'apiKey', in: 'header', name: 'X-API-Key' },
    },
  });
}
