import { describe, it, expect } from 'vitest';
import { AuthDescriptorBuilder } from './auth.js';
import { WarningCollector } from './errors.js';
import { makeSpec, petStoreSpec } from './test-fixtures.js';

describe('AuthDescriptorBuilder', () => {
  it('should map an API key header scheme', () => {
    const descriptors = new AuthDescriptorBuilder(petStoreSpec(), new WarningCollector()).build();

    expect(descriptors).toEqual([{ strategy: 'api_key', schemeName: 'ApiKeyAuth', parameterName: 'X-API-Key', location: 'header' }]);
  });

  it('should keep declaration order across strategies', () => {
    const spec = makeSpec({
      securitySchemes: {
        Basic: { type: 'http', scheme: 'Basic', description: 'User and password' },
        QueryKey: { type: 'apiKey', in: 'query', name: 'api_key' },
      },
    });

    expect(new AuthDescriptorBuilder(spec, new WarningCollector()).build()).toEqual([
      { strategy: 'basic', schemeName: 'Basic', description: 'User and password' },
      { strategy: 'api_key', schemeName: 'QueryKey', parameterName: 'api_key', location: 'query' },
    ]);
  });

  it('should fall back to none when no schemes are declared', () => {
    expect(new AuthDescriptorBuilder(makeSpec(), new WarningCollector()).build()).toEqual([{ strategy: 'none' }]);
  });

  it('should fall back to none and keep warnings when every scheme is dropped', () => {
    const warnings = new WarningCollector();
    const spec = makeSpec({
      securitySchemes: {
        Bearer: { type: 'http', scheme: 'bearer' },
        OAuth: { type: 'oauth2', flows: {} },
        Cookie: { type: 'apiKey', in: 'cookie', name: 'session' },
      },
    });

    expect(new AuthDescriptorBuilder(spec, warnings).build()).toEqual([{ strategy: 'none' }]);
    expect(warnings.warnings.map(warning => warning.message)).toEqual([
      '#/components/securitySchemes/Bearer: HTTP "bearer" authentication has no built-in helper',
      '#/components/securitySchemes/OAuth: "oauth2" security schemes are not supported',
      '#/components/securitySchemes/Cookie: API keys sent in "cookie" are not supported',
    ]);
  });
});
