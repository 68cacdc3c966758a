import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError } from './errors.js';
import { ClientGenerator } from './generator.js';
import { isUrl, loadSpec } from './loader.js';
import type { APIConfig, ForgeConfig, GeneratorOptions } from './types.js';
import { getArray, getBoolean, getObject, getString, isJsonObject, type JsonObject } from './utils/json.js';

export const DEFAULT_CONFIG_FILE = '.forge.json';
export const DEFAULT_OUTPUT_DIR = './generated';

function optionalString(entry: JsonObject, key: string, where: string): string | undefined {
  const value = entry[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new ConfigurationError(`${where}.${key} must be a string`);
}

function parseApi(entry: unknown, index: number): APIConfig {
  const where = `apis[${index}]`;
  if (!isJsonObject(entry)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const name = getString(entry, 'name');
  const spec = getString(entry, 'spec');
  if (name === undefined || spec === undefined) {
    throw new ConfigurationError(`${where} needs a "name" and a "spec"`);
  }

  const api: APIConfig = { name, spec };
  const output = optionalString(entry, 'output', where);
  const packageName = optionalString(entry, 'packageName', where);
  const baseUrl = optionalString(entry, 'baseUrl', where);
  if (output !== undefined) api.output = output;
  if (packageName !== undefined) api.packageName = packageName;
  if (baseUrl !== undefined) api.baseUrl = baseUrl;

  if (entry.includeTags !== undefined) {
    const tags = getArray(entry, 'includeTags');
    if (!tags || !tags.every((tag): tag is string => typeof tag === 'string')) {
      throw new ConfigurationError(`${where}.includeTags must be an array of strings`);
    }
    api.includeTags = [...tags];
  }

  if (entry.headers !== undefined) {
    const headers = getObject(entry, 'headers');
    if (!headers) {
      throw new ConfigurationError(`${where}.headers must be an object`);
    }
    const parsed: Record<string, string> = {};
    for (const [header, value] of Object.entries(headers)) {
      if (typeof value !== 'string') {
        throw new ConfigurationError(`${where}.headers.${header} must be a string`);
      }
      parsed[header] = value;
    }
    api.headers = parsed;
  }

  if (entry.failOnUnsupported !== undefined) {
    const failOnUnsupported = getBoolean(entry, 'failOnUnsupported');
    if (failOnUnsupported === undefined) {
      throw new ConfigurationError(`${where}.failOnUnsupported must be a boolean`);
    }
    api.failOnUnsupported = failOnUnsupported;
  }
  return api;
}

/**
 * Checks the shape of a parsed configuration file. Header values keep their `${VAR}`
 * references; `loadSpec` resolves them when the document is fetched.
 */
export function parseConfig(raw: unknown): ForgeConfig {
  if (!isJsonObject(raw)) {
    throw new ConfigurationError('The configuration must be a JSON object');
  }
  const apis = getArray(raw, 'apis');
  if (!apis) {
    throw new ConfigurationError(`Missing or invalid 'apis' array`);
  }
  if (apis.length === 0) {
    throw new ConfigurationError('No APIs found in configuration file');
  }

  const parsed = apis.map(parseApi);
  const seen = new Set<string>();
  for (const api of parsed) {
    if (seen.has(api.name)) {
      throw new ConfigurationError(`API "${api.name}" is configured more than once`);
    }
    seen.add(api.name);
  }
  return { apis: parsed };
}

/**
 * Reads a configuration file. Returns null when the file does not exist.
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<ForgeConfig | null> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isJsonObject(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${configPath} is not valid JSON`, { cause: error });
  }
  return parseConfig(raw);
}

export async function saveConfig(config: ForgeConfig, configPath: string = DEFAULT_CONFIG_FILE): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Parses repeated `-H "Name: Value"` flags.
 */
export function parseHeaderOptions(headerOptions: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const header of headerOptions) {
    const colonIndex = header.indexOf(':');
    if (colonIndex === -1) {
      throw new ConfigurationError(`Invalid header format "${header}". Use "Name: Value" format.`);
    }
    headers[header.substring(0, colonIndex).trim()] = header.substring(colonIndex + 1).trim();
  }
  return headers;
}

/**
 * Turns one configured API into generator options. Relative spec and output paths are taken
 * relative to the directory of the configuration file.
 */
export function toGeneratorOptions(api: APIConfig, configPath: string, extraHeaders: Record<string, string> = {}): GeneratorOptions {
  const configDir = path.dirname(path.resolve(configPath));
  const headers = { ...api.headers, ...extraHeaders };
  return {
    spec: isUrl(api.spec) ? api.spec : path.resolve(configDir, api.spec),
    outputDir: path.resolve(configDir, api.output ?? DEFAULT_OUTPUT_DIR),
    packageName: api.packageName,
    baseUrlOverride: api.baseUrl,
    includeTags: api.includeTags,
    failOnUnsupported: api.failOnUnsupported,
    headers: Object.keys(headers).length > 0 ? headers : undefined,
  };
}

/**
 * Builds a one-API configuration for a document, listing every tag it declares so they can be
 * pruned by hand. `spec` and `outputDir` are taken relative to the working directory and stored
 * relative to the directory of `configPath`, the way `toGeneratorOptions` reads them back.
 */
export async function buildConfigFromSpec(
  spec: string,
  configPath: string = DEFAULT_CONFIG_FILE,
  outputDir: string = DEFAULT_OUTPUT_DIR,
  headers?: Record<string, string>,
): Promise<ForgeConfig> {
  const document = await loadSpec(spec, { headers });
  const operations = new ClientGenerator().listOperations(document);
  const tags = [...new Set(operations.map(operation => operation.tag))];
  const configDir = path.dirname(path.resolve(configPath));

  const api: APIConfig = {
    name: document.info.title,
    spec: isUrl(spec) ? spec : path.relative(configDir, path.resolve(spec)),
    output: path.relative(configDir, path.resolve(outputDir)) || '.',
    includeTags: tags,
  };
  if (headers && Object.keys(headers).length > 0) {
    // Stored as given; ${VAR} references are resolved when the document is fetched
    api.headers = headers;
  }
  return { apis: [api] };
}
