export type GeneratorErrorKind =
  | 'InvalidSpecification'
  | 'UnsupportedConstruct'
  | 'NameCollisionExhausted'
  | 'InvalidConfiguration';

/**
 * Base class for every error raised while turning a specification into a client package.
 */
export abstract class GeneratorError extends Error {
  abstract readonly kind: GeneratorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The document is missing a mandatory part or points at something that does not exist.
 * Always fatal.
 */
export class InvalidSpecificationError extends GeneratorError {
  readonly kind = 'InvalidSpecification';
}

/**
 * A schema or security scheme uses a feature the generator does not model.
 * Collected as a warning unless the run is configured to fail on it.
 */
export class UnsupportedConstructError extends GeneratorError {
  readonly kind = 'UnsupportedConstruct';

  constructor(readonly location: string, detail: string) {
    super(`${location}: ${detail}`);
  }
}

export class NameCollisionExhaustedError extends GeneratorError {
  readonly kind = 'NameCollisionExhausted';

  constructor(readonly scope: string, readonly baseName: string, readonly attempts: number) {
    super(`Could not find a free name for "${baseName}" in scope "${scope}" after ${attempts} attempts`);
  }
}

/**
 * A `.forge.json` file that cannot be parsed or does not have the expected shape.
 */
export class ConfigurationError extends GeneratorError {
  readonly kind = 'InvalidConfiguration';
}

/**
 * Gathers the non-fatal problems of one generation run.
 */
export class WarningCollector {
  private readonly collected: UnsupportedConstructError[] = [];

  constructor(private readonly failOnUnsupported: boolean = false) {}

  unsupported(location: string, detail: string): void {
    const warning = new UnsupportedConstructError(location, detail);
    if (this.failOnUnsupported) {
      throw warning;
    }
    this.collected.push(warning);
  }

  get warnings(): readonly UnsupportedConstructError[] {
    return this.collected;
  }
}
