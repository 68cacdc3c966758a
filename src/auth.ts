import type { WarningCollector } from './errors.js';
import type { AuthDescriptor, SpecDocument } from './types.js';
import { escapePointer, getString } from './utils/json.js';

/**
 * Maps the declared security schemes onto the strategies a generated client has built-in helpers
 * for. Anything else is dropped with a warning; callers can still authenticate through the
 * client's `headers` option.
 */
export class AuthDescriptorBuilder {
  constructor(private readonly spec: SpecDocument, private readonly warnings: WarningCollector) {}

  build(): AuthDescriptor[] {
    const descriptors: AuthDescriptor[] = [];

    for (const [schemeName, scheme] of Object.entries(this.spec.securitySchemes)) {
      const location = `#/components/securitySchemes/${escapePointer(schemeName)}`;
      const type = getString(scheme, 'type');
      const description = getString(scheme, 'description');

      switch (type) {
        case 'apiKey': {
          const parameterName = getString(scheme, 'name');
          const where = getString(scheme, 'in');
          if (parameterName === undefined) {
            this.warnings.unsupported(location, 'API key scheme without a parameter name');
          } else if (where === 'header' || where === 'query') {
            descriptors.push({ strategy: 'api_key', schemeName, parameterName, location: where, description });
          } else {
            this.warnings.unsupported(location, `API keys sent in "${where ?? 'an unknown location'}" are not supported`);
          }
          break;
        }
        case 'http': {
          const httpScheme = getString(scheme, 'scheme')?.toLowerCase();
          if (httpScheme === 'basic') {
            descriptors.push({ strategy: 'basic', schemeName, description });
          } else {
            this.warnings.unsupported(location, `HTTP "${httpScheme ?? 'unknown'}" authentication has no built-in helper`);
          }
          break;
        }
        default:
          this.warnings.unsupported(location, `"${type ?? 'untyped'}" security schemes are not supported`);
      }
    }

    return descriptors.length > 0 ? descriptors : [{ strategy: 'none' }];
  }
}
