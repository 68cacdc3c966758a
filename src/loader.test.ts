import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import SwaggerParser from '@apidevtools/swagger-parser';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { InvalidSpecificationError } from './errors.js';
import { expandServerVariables, isUrl, loadSpec, normalizeDocument } from './loader.js';

const swaggerDocument = {
  swagger: '2.0',
  info: { title: 'Legacy Pets', version: '2.1.0' },
  host: 'api.example.com',
  basePath: '/v2',
  schemes: ['http'],
  consumes: ['application/json'],
  produces: ['application/json'],
  definitions: { Pet: { type: 'object', properties: { name: { type: 'string' } } } },
  parameters: { Limit: { name: 'limit', in: 'query', type: 'integer' } },
  responses: { NotFound: { description: 'not found' } },
  securityDefinitions: { Basic: { type: 'basic' } },
  paths: {
    'x-internal': { get: {} },
    '/pets': {
      get: {
        operationId: 'listPets',
        parameters: [{ $ref: '#/parameters/Limit' }],
        responses: {
          '200': { description: 'ok', schema: { type: 'array', items: { $ref: '#/definitions/Pet' } } },
          '404': { $ref: '#/responses/NotFound' },
        },
      },
      post: {
        operationId: 'createPet',
        parameters: [{ name: 'pet', in: 'body', required: true, schema: { $ref: '#/definitions/Pet' } }],
        responses: { '201': { description: 'created' } },
      },
    },
    '/pets/{id}/photo': {
      parameters: [{ name: 'id', in: 'path', required: true, type: 'string' }],
      post: {
        operationId: 'uploadPhoto',
        parameters: [
          { name: 'file', in: 'formData', required: true, type: 'file' },
          { name: 'caption', in: 'formData', type: 'string', maxLength: 80 },
        ],
        responses: { '204': { description: 'stored' } },
      },
    },
  },
};

describe('loader helpers', () => {
  it('should recognize URLs', () => {
    expect(isUrl('https://example.com/openapi.json')).toBe(true);
    expect(isUrl('http://localhost/openapi.yaml')).toBe(true);
    expect(isUrl('./openapi.yaml')).toBe(false);
  });

  it('should substitute server variable defaults and keep unknown ones', () => {
    expect(expandServerVariables('https://{region}.example.com/{version}', { region: { default: 'eu' } })).toBe(
      'https://eu.example.com/{version}',
    );
  });
});

describe('normalizeDocument', () => {
  it('should read the sections of an OpenAPI 3 document', () => {
    const spec = normalizeDocument({
      openapi: '3.1.0',
      info: { title: 'Pets', version: '1.0.0', description: 'All the pets' },
      servers: [{ url: 'https://{env}.example.com', variables: { env: { default: 'api' } } }, { url: '/fallback' }],
      paths: { '/pets': { get: { responses: {} } }, 'x-extra': {} },
      components: {
        schemas: { Pet: { type: 'object' } },
        securitySchemes: { Key: { type: 'apiKey', in: 'header', name: 'X-Key' } },
      },
    });

    expect(spec.info).toEqual({ title: 'Pets', version: '1.0.0', description: 'All the pets' });
    expect(spec.servers).toEqual(['https://api.example.com', '/fallback']);
    expect(Object.keys(spec.paths)).toEqual(['/pets']);
    expect(Object.keys(spec.schemas)).toEqual(['Pet']);
    expect(spec.securitySchemes.Key).toEqual({ type: 'apiKey', in: 'header', name: 'X-Key' });
    expect(spec.parameters).toEqual({});
  });

  it('should reject unsupported versions', () => {
    expect(() => normalizeDocument({ swagger: '1.2', info: {}, paths: {} })).toThrow(new InvalidSpecificationError('Unsupported Swagger version "1.2"'));
    expect(() => normalizeDocument({ info: {}, paths: {} })).toThrow(new InvalidSpecificationError('Unsupported OpenAPI version "missing"'));
  });

  describe('Swagger 2.0', () => {
    it('should build the server from host, base path and scheme', () => {
      const spec = normalizeDocument(swaggerDocument);

      expect(spec.info).toEqual({ title: 'Legacy Pets', version: '2.1.0' });
      expect(spec.servers).toEqual(['http://api.example.com/v2']);
      expect(normalizeDocument({ ...swaggerDocument, host: undefined }).servers).toEqual(['/v2']);
    });

    it('should move definitions and security definitions', () => {
      const spec = normalizeDocument(swaggerDocument);

      expect(Object.keys(spec.schemas)).toEqual(['Pet']);
      expect(spec.securitySchemes).toEqual({ Basic: { type: 'http', scheme: 'basic' } });
    });

    it('should inline shared parameters and responses', () => {
      const listPets = normalizeDocument(swaggerDocument).paths['/pets'].get;

      expect(listPets).toEqual({
        operationId: 'listPets',
        parameters: [{ name: 'limit', in: 'query', schema: { type: 'integer' } }],
        responses: {
          '200': {
            description: 'ok',
            content: { 'application/json': { schema: { type: 'array', items: { $ref: '#/definitions/Pet' } } } },
          },
          '404': { description: 'not found' },
        },
      });
    });

    it('should turn a body parameter into a request body', () => {
      const createPet = normalizeDocument(swaggerDocument).paths['/pets'].post;

      expect(createPet).toEqual({
        operationId: 'createPet',
        parameters: [],
        requestBody: { required: true, content: { 'application/json': { schema: { $ref: '#/definitions/Pet' } } } },
        responses: { '201': { description: 'created' } },
      });
    });

    it('should turn form fields into a multipart body when one of them is a file', () => {
      const uploadPhoto = normalizeDocument(swaggerDocument).paths['/pets/{id}/photo'].post;

      expect(uploadPhoto).toEqual({
        operationId: 'uploadPhoto',
        parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'string' } }],
        requestBody: {
          required: true,
          content: {
            'multipart/form-data': {
              schema: {
                type: 'object',
                properties: { file: { type: 'string', format: 'binary' }, caption: { type: 'string', maxLength: 80 } },
                required: ['file'],
              },
            },
          },
        },
        responses: { '204': { description: 'stored' } },
      });
    });

    it('should send plain form fields URL-encoded', () => {
      const spec = normalizeDocument({
        swagger: '2.0',
        info: { title: 'Forms', version: '1' },
        paths: { '/login': { post: { parameters: [{ name: 'user', in: 'formData', type: 'string' }], responses: {} } } },
      });

      expect(spec.servers).toEqual([]);
      expect(spec.paths['/login'].post).toMatchObject({
        requestBody: {
          required: false,
          content: { 'application/x-www-form-urlencoded': { schema: { type: 'object', properties: { user: { type: 'string' } } } } },
        },
      });
    });

    it('should reject an unresolvable parameter reference', () => {
      const document = {
        ...swaggerDocument,
        paths: { '/pets': { get: { parameters: [{ $ref: '#/parameters/Missing' }], responses: {} } } },
      };

      expect(() => normalizeDocument(document)).toThrow('Unresolvable $ref "#/parameters/Missing" at #/paths/~1pets/get/parameters/0');
    });
  });
});

describe('loadSpec', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forge-loader-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should resolve environment variables in headers exactly once', async () => {
    const originalEnv = process.env;
    process.env = { ...originalEnv, FORGE_TOKEN: 'test-${FORGE_OTHER}', FORGE_OTHER: 'secret' };
    const bundle = vi.spyOn(SwaggerParser, 'bundle').mockRejectedValue(new Error('offline'));

    try {
      await expect(
        loadSpec('https://example.com/openapi.json', { headers: { Authorization: 'Bearer ${FORGE_TOKEN}' } }),
      ).rejects.toThrow('Failed to read https://example.com/openapi.json: offline');
    } finally {
      process.env = originalEnv;
    }

    expect(bundle).toHaveBeenCalledWith('https://example.com/openapi.json', {
      resolve: { http: { headers: { Authorization: 'Bearer test-${FORGE_OTHER}' } } },
    });
  });

  it('should load and normalize a document from disk', async () => {
    const specPath = path.join(tempDir, 'openapi.json');
    await fs.writeFile(
      specPath,
      JSON.stringify({
        openapi: '3.0.3',
        info: { title: 'Disk API', version: '1.0.0' },
        servers: [{ url: 'https://disk.example.com' }],
        paths: {
          '/items': {
            get: {
              operationId: 'listItems',
              responses: {
                '200': {
                  description: 'ok',
                  content: { 'application/json': { schema: { type: 'array', items: { $ref: '#/components/schemas/Item' } } } },
                },
              },
            },
          },
        },
        components: { schemas: { Item: { type: 'object', properties: { id: { type: 'string' } } } } },
      }),
    );

    const spec = await loadSpec(specPath);

    expect(spec.info.title).toBe('Disk API');
    expect(spec.servers).toEqual(['https://disk.example.com']);
    // References stay in place for the generator to name
    expect(spec.paths['/items'].get).toMatchObject({
      responses: { '200': { content: { 'application/json': { schema: { items: { $ref: '#/components/schemas/Item' } } } } } },
    });
  });

  it('should report a missing file as an invalid specification', async () => {
    await expect(loadSpec(path.join(tempDir, 'missing.json'))).rejects.toBeInstanceOf(InvalidSpecificationError);
  });

  it('should report a document that fails validation', async () => {
    const specPath = path.join(tempDir, 'broken.json');
    await fs.writeFile(
      specPath,
      JSON.stringify({ openapi: '3.0.3', info: { title: 'Broken', version: '1.0.0' }, paths: { '/items': { get: { operationId: 7 } } } }),
    );

    await expect(loadSpec(specPath)).rejects.toBeInstanceOf(InvalidSpecificationError);
  });
});
