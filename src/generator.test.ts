import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { InvalidSpecificationError, UnsupportedConstructError } from './errors.js';
import { ClientGenerator, generateFromSpec } from './generator.js';
import { makeSpec, petStoreSpec } from './test-fixtures.js';

const ok = { '200': { description: 'ok' } };

function taggedSpec() {
  return makeSpec({
    paths: {
      '/pets': { get: { operationId: 'listPets', tags: ['pets'], responses: ok } },
      '/orders': { get: { operationId: 'listOrders', tags: ['store'], responses: ok } },
    },
  });
}

describe('ClientGenerator', () => {
  it('should generate a package without warnings for a supported document', () => {
    const result = new ClientGenerator().generate(petStoreSpec());

    expect(result.warnings).toEqual([]);
    expect(result.files.get('package.json')).toContain('"name": "pet-store"');
  });

  it('should derive a valid npm name from a title that starts with a digit', () => {
    const result = new ClientGenerator().generate(makeSpec({ ...petStoreSpec(), info: { title: '123 API', version: '1.0.0' } }));

    expect(result.files.get('package.json')).toContain('"name": "123-api"');
    expect(result.files.get('client.ts')).toContain('export class _123ApiClient {');
  });

  it('should only emit modules for the included tags', () => {
    const result = new ClientGenerator({ includeTags: ['store'] }).generate(taggedSpec());

    expect([...result.files.keys()]).toEqual(['index.ts', 'client.ts', 'models.ts', 'api/store.ts', 'package.json', 'README.md']);
  });

  it('should fail on the first unsupported construct when configured to', () => {
    const spec = makeSpec({ ...petStoreSpec(), schemas: { ...petStoreSpec().schemas, Mixed: { type: ['string', 'integer'] } } });

    expect(new ClientGenerator().generate(spec).warnings).toHaveLength(1);
    expect(() => new ClientGenerator({ failOnUnsupported: true }).generate(spec)).toThrow(UnsupportedConstructError);
  });

  it('should start every run from fresh names', () => {
    const generator = new ClientGenerator();
    const first = generator.generate(petStoreSpec());
    const second = generator.generate(petStoreSpec());

    expect([...second.files.entries()]).toEqual([...first.files.entries()]);
  });

  it('should list the operations a run would emit', () => {
    const operations = new ClientGenerator({ includeTags: ['pets'] }).listOperations(taggedSpec());

    expect(operations.map(operation => [operation.tag, operation.methodName, operation.method, operation.path])).toEqual([
      ['pets', 'listPets', 'get', '/pets'],
    ]);
  });
});

describe('generateFromSpec', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forge-generator-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeSpec(document: object): Promise<string> {
    const specPath = path.join(tempDir, 'openapi.json');
    await fs.writeFile(specPath, JSON.stringify(document));
    return specPath;
  }

  const petDocument = {
    openapi: '3.0.3',
    info: { title: 'Pet Store', version: '1.0.0' },
    servers: [{ url: 'https://petstore.example.com/v1' }],
    paths: {
      '/pets/{id}': {
        get: {
          operationId: 'getPet',
          tags: ['pets'],
          parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'integer' } }],
          responses: {
            '200': { description: 'ok', content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } } },
          },
        },
      },
    },
    components: {
      schemas: { Pet: { type: 'object', required: ['id'], properties: { id: { type: 'integer' } } } },
    },
  };

  it('should write the generated package to the output directory', async () => {
    const spec = await writeSpec(petDocument);
    const outputDir = path.join(tempDir, 'client');

    const result = await generateFromSpec({ spec, outputDir, noProgress: true });

    const written = await fs.readdir(outputDir, { recursive: true });
    expect([...written].sort()).toEqual(['README.md', 'api', path.join('api', 'pets.ts'), 'client.ts', 'index.ts', 'models.ts', 'package.json']);
    expect(await fs.readFile(path.join(outputDir, 'models.ts'), 'utf-8')).toBe(result.files.get('models.ts'));
  });

  it('should apply the package name and base URL options', async () => {
    const spec = await writeSpec(petDocument);

    const result = await generateFromSpec({
      spec,
      outputDir: path.join(tempDir, 'client'),
      packageName: 'pets-sdk',
      baseUrlOverride: 'http://localhost:4010',
      noProgress: true,
    });

    expect(result.files.get('package.json')).toContain('"name": "pets-sdk"');
    expect(result.files.get('client.ts')).toContain('export const DEFAULT_BASE_URL = "http://localhost:4010";');
  });

  it('should report progress and warnings', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const spec = await writeSpec({
      ...petDocument,
      openapi: '3.1.0',
      components: { schemas: { ...petDocument.components.schemas, Mixed: { type: ['string', 'integer'] } } },
    });

    const result = await generateFromSpec({ spec, outputDir: path.join(tempDir, 'client') });

    const lines = write.mock.calls.map(([chunk]) => String(chunk));
    expect(lines[0]).toBe(`\r\x1b[K📄 Loading OpenAPI specification from ${spec}...\n`);
    expect(lines).toContain('\r\x1b[K⚠️  #/components/schemas/Mixed: multiple types (string, integer) are not supported\n');
    expect(lines.at(-1)).toBe('\r\x1b[K✅ Generation complete!\n');
    expect(result.warnings).toHaveLength(1);
  });

  it('should generate from a document split over several files', async () => {
    await fs.writeFile(
      path.join(tempDir, 'pet.json'),
      JSON.stringify({ type: 'object', required: ['name'], properties: { name: { type: 'string' } } }),
    );
    const petContent = { 'application/json': { schema: { $ref: './pet.json' } } };
    const spec = await writeSpec({
      openapi: '3.0.3',
      info: { title: 'Split API', version: '1.0.0' },
      paths: {
        '/pets': {
          get: { operationId: 'getPet', responses: { '200': { description: 'ok', content: petContent } } },
          post: { operationId: 'createPet', requestBody: { content: petContent }, responses: { '201': { description: 'created' } } },
        },
      },
    });

    const result = await generateFromSpec({ spec, outputDir: path.join(tempDir, 'client'), noProgress: true });

    expect(result.warnings).toEqual([]);
    expect(result.files.get('models.ts')).toContain('export interface GetPetResponse {');
    expect(result.files.get('models.ts')).toContain('export interface CreatePetRequest {');
    expect(result.files.get('api/default.ts')).toContain('public async getPet(options?: RequestOptions): Promise<GetPetResponse> {');
  });

  it('should write nothing when the document is invalid', async () => {
    const spec = await writeSpec({
      ...petDocument,
      components: { schemas: { Pet: { type: 'object', properties: { owner: { $ref: '#/components/schemas/Owner' } } } } },
    });
    const outputDir = path.join(tempDir, 'client');

    await expect(generateFromSpec({ spec, outputDir, noProgress: true })).rejects.toBeInstanceOf(InvalidSpecificationError);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });
});
