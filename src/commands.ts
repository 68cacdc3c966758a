import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_OUTPUT_DIR,
  buildConfigFromSpec,
  loadConfig,
  parseHeaderOptions,
  saveConfig,
  toGeneratorOptions,
} from './config.js';
import { ClientGenerator, generateFromSpec } from './generator.js';
import { isUrl, loadSpec } from './loader.js';
import type { APIConfig, ForgeConfig, GeneratorOptions } from './types.js';
import { getString, isJsonObject } from './utils/json.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

interface GenerateCommandOptions {
  output: string;
  packageName?: string;
  baseUrl?: string;
  tag: string[];
  header: string[];
  config?: string;
  api?: string;
  failOnUnsupported?: boolean;
  dryRun?: boolean;
  progress: boolean;
}

interface InitCommandOptions {
  output: string;
  config: string;
  header: string[];
  force?: boolean;
}

interface ListCommandOptions {
  config: string;
  api?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function readVersion(): string {
  // Same relative location from src/ and dist/
  const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  return (isJsonObject(packageJson) && getString(packageJson, 'version')) || '0.0.0';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a command action so failures print a message and set a failing exit code. With
 * `--verbose` the stack trace follows the message.
 */
function reportErrors<A extends unknown[]>(
  program: Command,
  title: string,
  action: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      console.error(`\n❌ ${title}:`);
      console.error(`   ${errorMessage(error)}`);
      if (error instanceof Error && error.cause !== undefined) {
        console.error(`   Caused by: ${errorMessage(error.cause)}`);
      }
      if (program.opts<{ verbose?: boolean }>().verbose && error instanceof Error && error.stack) {
        console.error(`\n${error.stack}`);
      }
      process.exitCode = 1;
    }
  };
}

async function requireConfig(configPath: string): Promise<ForgeConfig> {
  const config = await loadConfig(configPath);
  if (!config) {
    throw new Error(`Configuration file not found: ${configPath}. Run "api-client-forge init <spec>" to create one.`);
  }
  return config;
}

function selectApis(config: ForgeConfig, name: string | undefined): APIConfig[] {
  if (name === undefined) {
    return config.apis;
  }
  const api = config.apis.find(candidate => candidate.name === name);
  if (!api) {
    throw new Error(`API "${name}" not found in configuration file. Available APIs: ${config.apis.map(candidate => candidate.name).join(', ')}`);
  }
  return [api];
}

async function runGenerate(spec: string | undefined, options: GenerateCommandOptions): Promise<void> {
  console.log('🚀 API Client Forge');
  console.log('===================\n');

  const headers = parseHeaderOptions(options.header);
  let runs: Array<{ name: string; options: GeneratorOptions }>;

  if (spec !== undefined) {
    if (!isUrl(spec) && !fs.existsSync(spec)) {
      throw new Error(`OpenAPI spec file not found: ${spec}`);
    }
    runs = [
      {
        name: spec,
        options: {
          spec: isUrl(spec) ? spec : path.resolve(spec),
          outputDir: path.resolve(options.output),
          packageName: options.packageName,
          baseUrlOverride: options.baseUrl,
          includeTags: options.tag.length > 0 ? options.tag : undefined,
          failOnUnsupported: options.failOnUnsupported,
          headers: Object.keys(headers).length > 0 ? headers : undefined,
        },
      },
    ];
  } else {
    const configPath = path.resolve(options.config ?? DEFAULT_CONFIG_FILE);
    const config = await requireConfig(configPath);
    console.log(`📋 Using configuration: ${configPath}`);
    runs = selectApis(config, options.api).map(api => ({ name: api.name, options: toGeneratorOptions(api, configPath, headers) }));
  }

  for (const [index, run] of runs.entries()) {
    const generatorOptions = { ...run.options, noProgress: !options.progress };
    if (runs.length > 1) {
      console.log(`\n🔄 Generating API ${index + 1}/${runs.length}: ${run.name}`);
    }
    console.log(`📄 Input spec: ${generatorOptions.spec}`);
    if (generatorOptions.headers) {
      console.log(`🔑 Headers: ${Object.keys(generatorOptions.headers).join(', ')}`);
    }
    console.log(`📁 Output directory: ${generatorOptions.outputDir}\n`);

    if (options.dryRun) {
      const document = await loadSpec(generatorOptions.spec, { headers: generatorOptions.headers });
      const result = new ClientGenerator(generatorOptions).generate(document);
      console.log('🔍 Dry run mode - no files will be written\n');
      console.log('Would generate:');
      for (const file of result.files.keys()) {
        console.log(`  ${path.join(generatorOptions.outputDir, file)}`);
      }
      for (const warning of result.warnings) {
        console.log(`⚠️  ${warning.message}`);
      }
      continue;
    }

    const result = await generateFromSpec(generatorOptions);
    console.log('\nGenerated files:');
    for (const file of result.files.keys()) {
      console.log(`  📄 ${path.relative(process.cwd(), path.join(generatorOptions.outputDir, file))}`);
    }
    if (result.warnings.length > 0) {
      console.log(`\n⚠️  ${result.warnings.length} unsupported construct(s) were emitted as unknown`);
    }
  }

  if (!options.dryRun) {
    console.log(runs.length > 1 ? '\n🎉 All APIs generated successfully!' : '\n✅ Generation completed successfully!');
  }
}

async function runInit(spec: string, options: InitCommandOptions): Promise<void> {
  console.log('🔧 Initializing API Client Forge configuration');
  console.log('=============================================\n');

  if (!isUrl(spec) && !fs.existsSync(spec)) {
    throw new Error(`OpenAPI spec file not found: ${spec}`);
  }
  const configPath = path.resolve(options.config);
  if (fs.existsSync(configPath) && !options.force) {
    throw new Error(`${configPath} already exists. Use --force to overwrite it.`);
  }

  const headers = parseHeaderOptions(options.header);
  console.log(`📄 Input spec: ${spec}`);
  console.log(`📁 Output directory: ${options.output}`);
  console.log(`⚙️  Config file: ${configPath}\n`);

  const config = await buildConfigFromSpec(spec, configPath, options.output, Object.keys(headers).length > 0 ? headers : undefined);
  await saveConfig(config, configPath);

  console.log('✅ Configuration file created successfully!');
  console.log(`🏷️  Found ${config.apis[0].includeTags?.length ?? 0} tag(s)`);
  console.log(`📝 Edit ${configPath} to choose which tags to generate, then run: api-client-forge generate`);
}

async function runList(options: ListCommandOptions): Promise<void> {
  const configPath = path.resolve(options.config);
  const config = await requireConfig(configPath);

  console.log('📋 Available Operations');
  console.log('======================\n');

  for (const api of selectApis(config, options.api)) {
    const generatorOptions = toGeneratorOptions(api, configPath);
    const document = await loadSpec(generatorOptions.spec, { headers: generatorOptions.headers });
    const operations = new ClientGenerator(generatorOptions).listOperations(document);

    console.log(`🏷️  API: ${api.name}`);
    console.log(`📄 Spec: ${api.spec}`);
    console.log(`📁 Output: ${api.output ?? DEFAULT_OUTPUT_DIR}`);
    let currentTag: string | undefined;
    for (const operation of [...operations].sort((a, b) => (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))) {
      if (operation.tag !== currentTag) {
        currentTag = operation.tag;
        console.log(`\n  ${currentTag}:`);
      }
      console.log(`    ${operation.methodName}  ${operation.method.toUpperCase()} ${operation.path}`);
    }
    console.log('');
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('api-client-forge')
    .description('Generate typed TypeScript API clients from OpenAPI specifications')
    .version(readVersion())
    .option('-v, --verbose', 'Print stack traces when a command fails');

  program
    .command('generate')
    .description('Generate a client package from an OpenAPI spec or from the configuration file')
    .argument('[spec]', 'Path to OpenAPI specification file (YAML or JSON) or URL (optional if config file found)')
    .option('-o, --output <dir>', 'Output directory for generated files', DEFAULT_OUTPUT_DIR)
    .option('-p, --package-name <name>', 'Name of the generated package')
    .option('-b, --base-url <url>', 'Base URL to use instead of the one the spec declares')
    .option('-t, --tag <tag>', 'Only generate operations with this tag (repeatable)', collect, [])
    .option('-H, --header <header>', 'Add header for URL requests (format: "Name: Value")', collect, [])
    .option('-c, --config <file>', `Configuration file path (default: ${DEFAULT_CONFIG_FILE})`)
    .option('--api <name>', 'API name to generate from config (if multiple APIs in config)')
    .option('--fail-on-unsupported', 'Fail instead of warning when the spec uses an unsupported construct')
    .option('--dry-run', 'Show what would be generated without writing files')
    .option('--no-progress', 'Disable progress output')
    .action(reportErrors(program, 'Generation failed', runGenerate));

  program
    .command('init')
    .description(`Create a ${DEFAULT_CONFIG_FILE} configuration file from an OpenAPI spec`)
    .argument('<spec>', 'Path to OpenAPI specification file (YAML or JSON) or URL')
    .option('-o, --output <dir>', 'Output directory for generated files', DEFAULT_OUTPUT_DIR)
    .option('-c, --config <file>', 'Configuration file path', DEFAULT_CONFIG_FILE)
    .option('-H, --header <header>', 'Add header for URL requests (format: "Name: Value")', collect, [])
    .option('-f, --force', 'Overwrite an existing configuration file')
    .action(reportErrors(program, 'Failed to initialize configuration', runInit));

  program
    .command('list')
    .description('List the tags and operations of the configured APIs')
    .option('-c, --config <file>', 'Configuration file path', DEFAULT_CONFIG_FILE)
    .option('--api <name>', 'Only list this API')
    .action(reportErrors(program, 'Failed to list operations', runList));

  return program;
}
