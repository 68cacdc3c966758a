import { AuthDescriptorBuilder } from './auth.js';
import { CLIENT_EXPORTS, PackageComposer } from './composer.js';
import { WarningCollector } from './errors.js';
import { loadSpec } from './loader.js';
import { OperationExtractor } from './operations.js';
import { SchemaResolver } from './resolver.js';
import type { GenerationResult, GeneratorConfig, GeneratorOptions, Operation, SpecDocument } from './types.js';
import { NameRegistry, sanitize } from './utils/naming.js';
import { ProgressIndicator } from './utils/progress.js';
import { writePackage } from './writer.js';

/**
 * Runs the whole generation pipeline over one document: resolve the schemas, extract the
 * operations, map the auth schemes and compose the package. Every run starts from fresh
 * registries, so one generator can be reused for any number of documents.
 */
export class ClientGenerator {
  constructor(private readonly config: GeneratorConfig = {}) {}

  generate(spec: SpecDocument): GenerationResult {
    const warnings = new WarningCollector(this.config.failOnUnsupported);
    const packageName = sanitize(this.config.packageName ?? spec.info.title, 'module');
    const clientClassName = sanitize(`${packageName} client`, 'class');

    const names = new NameRegistry('types').reserve(clientClassName, `${clientClassName}Options`, ...CLIENT_EXPORTS);
    const resolver = new SchemaResolver(spec, names, warnings);
    resolver.resolveAll();
    const operations = new OperationExtractor(spec, resolver, names, warnings, { includeTags: this.config.includeTags }).extractAll();
    const auth = new AuthDescriptorBuilder(spec, warnings).build();

    const composer = new PackageComposer({
      packageName,
      clientClassName,
      info: spec.info,
      baseUrl: this.config.baseUrlOverride ?? spec.servers[0],
      names,
    });

    return {
      files: composer.compose(resolver.resolved, operations, auth),
      warnings: warnings.warnings,
    };
  }

  /**
   * Extracts the operations a run would emit, without composing any files.
   */
  listOperations(spec: SpecDocument): Operation[] {
    const warnings = new WarningCollector();
    const names = new NameRegistry('types');
    const resolver = new SchemaResolver(spec, names, warnings);
    resolver.resolveAll();
    return new OperationExtractor(spec, resolver, names, warnings, { includeTags: this.config.includeTags }).extractAll();
  }
}

/**
 * Loads a document, generates its client package and writes it to `options.outputDir`.
 * Nothing is written when generation fails.
 */
export async function generateFromSpec(options: GeneratorOptions): Promise<GenerationResult> {
  const progress = new ProgressIndicator(options.noProgress);

  progress.message(`📄 Loading OpenAPI specification from ${options.spec}...`);
  const spec = await loadSpec(options.spec, { headers: options.headers });

  progress.message('🔨 Generating client package...');
  const result = new ClientGenerator(options).generate(spec);
  for (const warning of result.warnings) {
    progress.warn(warning.message);
  }

  progress.start(result.files.size, '💾 Saving files');
  const written = await writePackage(options.outputDir, result.files);
  progress.update(written.length);
  progress.complete();

  progress.message('✅ Generation complete!');
  return result;
}
