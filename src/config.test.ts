import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  buildConfigFromSpec,
  loadConfig,
  parseConfig,
  parseHeaderOptions,
  saveConfig,
  toGeneratorOptions,
} from './config.js';
import { ConfigurationError } from './errors.js';
import type { ForgeConfig } from './types.js';

describe('parseConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should accept a complete entry', () => {
    const raw = {
      apis: [
        {
          name: 'pets',
          spec: './pets.yaml',
          output: './clients/pets',
          packageName: 'pets-client',
          baseUrl: 'https://staging.example.com',
          includeTags: ['pets'],
          failOnUnsupported: true,
        },
      ],
    };

    expect(parseConfig(raw)).toEqual(raw);
  });

  it('should keep environment references in headers for the loader to resolve', () => {
    process.env.FORGE_TOKEN = 'test-secret';

    const config = parseConfig({
      apis: [{ name: 'pets', spec: 'https://example.com/openapi.json', headers: { Authorization: 'Bearer ${FORGE_TOKEN}', 'X-Team': '${FORGE_TEAM:core}' } }],
    });

    expect(config.apis[0].headers).toEqual({ Authorization: 'Bearer ${FORGE_TOKEN}', 'X-Team': '${FORGE_TEAM:core}' });
  });

  const invalidConfigs: Array<[string, unknown, string]> = [
    ['a non-object', 'apis', 'The configuration must be a JSON object'],
    ['a missing apis array', {}, "Missing or invalid 'apis' array"],
    ['an empty apis array', { apis: [] }, 'No APIs found in configuration file'],
    ['an entry without a spec', { apis: [{ name: 'pets' }] }, 'apis[0] needs a "name" and a "spec"'],
    ['a non-string output', { apis: [{ name: 'pets', spec: 'a.yaml', output: 3 }] }, 'apis[0].output must be a string'],
    ['a mixed tag list', { apis: [{ name: 'pets', spec: 'a.yaml', includeTags: ['pets', 1] }] }, 'apis[0].includeTags must be an array of strings'],
    ['a non-string header', { apis: [{ name: 'pets', spec: 'a.yaml', headers: { 'X-Id': 1 } }] }, 'apis[0].headers.X-Id must be a string'],
    ['a non-boolean flag', { apis: [{ name: 'pets', spec: 'a.yaml', failOnUnsupported: 'yes' }] }, 'apis[0].failOnUnsupported must be a boolean'],
    [
      'duplicate names',
      { apis: [{ name: 'pets', spec: 'a.yaml' }, { name: 'pets', spec: 'b.yaml' }] },
      'API "pets" is configured more than once',
    ],
  ];

  it.each(invalidConfigs)('should reject %s', (_description, raw, message) => {
    expect(() => parseConfig(raw)).toThrow(new ConfigurationError(message));
  });
});

describe('configuration files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'forge-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return null when the file does not exist', async () => {
    expect(await loadConfig(path.join(tempDir, '.forge.json'))).toBeNull();
  });

  it('should read back what it saved', async () => {
    const configPath = path.join(tempDir, '.forge.json');
    const config: ForgeConfig = { apis: [{ name: 'pets', spec: './pets.yaml', includeTags: ['pets', 'store'] }] };

    await saveConfig(config, configPath);

    expect(await fs.readFile(configPath, 'utf-8')).toBe(JSON.stringify(config, null, 2) + '\n');
    expect(await loadConfig(configPath)).toEqual(config);
  });

  it('should create the directory of a new configuration file', async () => {
    const configPath = path.join(tempDir, 'configs', '.forge.json');

    await saveConfig({ apis: [{ name: 'pets', spec: '../openapi.json' }] }, configPath);

    expect(await loadConfig(configPath)).toEqual({ apis: [{ name: 'pets', spec: '../openapi.json' }] });
  });

  it('should reject a file that is not JSON', async () => {
    const configPath = path.join(tempDir, '.forge.json');
    await fs.writeFile(configPath, '{ apis: ');

    await expect(loadConfig(configPath)).rejects.toThrow(new ConfigurationError(`${configPath} is not valid JSON`));
  });

  it('should list every tag of a document in a new configuration', async () => {
    const specPath = path.join(tempDir, 'openapi.json');
    const ok = { '200': { description: 'ok' } };
    await fs.writeFile(
      specPath,
      JSON.stringify({
        openapi: '3.0.3',
        info: { title: 'Shop API', version: '1.0.0' },
        paths: {
          '/pets': { get: { tags: ['pets'], responses: ok } },
          '/orders': { get: { tags: ['store'], responses: ok } },
          '/health': { get: { responses: ok } },
        },
      }),
    );

    const config = await buildConfigFromSpec(specPath, path.join(tempDir, '.forge.json'), path.join(tempDir, 'clients', 'shop'), {
      Authorization: 'Bearer ${SHOP_TOKEN}',
    });

    expect(config).toEqual({
      apis: [
        {
          name: 'Shop API',
          spec: 'openapi.json',
          output: path.join('clients', 'shop'),
          includeTags: ['pets', 'store', 'default'],
          headers: { Authorization: 'Bearer ${SHOP_TOKEN}' },
        },
      ],
    });
  });
});

describe('parseHeaderOptions', () => {
  it('should split on the first colon and trim both sides', () => {
    expect(parseHeaderOptions(['Authorization: Bearer test-secret', 'X-Trace :a:b '])).toEqual({
      Authorization: 'Bearer test-secret',
      'X-Trace': 'a:b',
    });
  });

  it('should reject a header without a colon', () => {
    expect(() => parseHeaderOptions(['InvalidHeader'])).toThrow(
      new ConfigurationError('Invalid header format "InvalidHeader". Use "Name: Value" format.'),
    );
  });
});

describe('toGeneratorOptions', () => {
  it('should resolve paths against the configuration directory', () => {
    const options = toGeneratorOptions(
      { name: 'pets', spec: 'specs/pets.yaml', output: 'out/pets', includeTags: ['pets'], headers: { 'X-Team': 'core' } },
      '/work/project/.forge.json',
      { Authorization: 'Bearer test-secret' },
    );

    expect(options).toEqual({
      spec: '/work/project/specs/pets.yaml',
      outputDir: '/work/project/out/pets',
      includeTags: ['pets'],
      headers: { 'X-Team': 'core', Authorization: 'Bearer test-secret' },
    });
  });

  it('should keep URLs and fall back to the default output directory', () => {
    const options = toGeneratorOptions({ name: 'pets', spec: 'https://example.com/openapi.json' }, '/work/project/.forge.json');

    expect(options.spec).toBe('https://example.com/openapi.json');
    expect(options.outputDir).toBe('/work/project/generated');
    expect(options.headers).toBeUndefined();
  });
});
