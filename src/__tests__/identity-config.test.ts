import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  IdentityConfigLoader,
  ENV_IAM_JWKS_URL,
  lookupJwksConfig,
  resolveConfigValue
} from '../config/identity-config';
import { ConfigError } from '../errors';
import { EnvLookup } from '../types';

const envWith = (values: Record<string, string>): EnvLookup => (name) => values[name];

describe('IdentityConfigLoader', () => {
  describe('loadFromString', () => {
    it('should parse a full configuration', () => {
      const yamlContent = `
name: "storage-web-identity"
jwks:
  url: "https://idp.example.com/realms/storage/protocol/openid-connect/certs"
  timeoutMs: 5000
`;

      const config = IdentityConfigLoader.loadFromString(yamlContent);

      expect(config).toEqual({
        name: 'storage-web-identity',
        jwks: {
          url: 'https://idp.example.com/realms/storage/protocol/openid-connect/certs',
          timeoutMs: 5000
        }
      });
    });

    it('should handle empty configuration', () => {
      expect(IdentityConfigLoader.loadFromString('')).toEqual({});
    });

    it('should reject a url that is not a string', () => {
      const yamlContent = `
jwks:
  url: 42
`;

      expect(() => IdentityConfigLoader.loadFromString(yamlContent))
        .toThrow('Failed to parse identity configuration: Invalid configuration: "jwks.url" must be a string');
    });

    it('should reject a non-positive timeout', () => {
      const yamlContent = `
jwks:
  timeoutMs: 0
`;

      expect(() => IdentityConfigLoader.loadFromString(yamlContent)).toThrow(ConfigError);
    });

    it('should reject a top-level list', () => {
      expect(() => IdentityConfigLoader.loadFromString('- jwks'))
        .toThrow('expected a mapping at the top level');
    });

    it('should wrap YAML syntax errors', () => {
      expect(() => IdentityConfigLoader.loadFromString('jwks: [unclosed'))
        .toThrow(/^Failed to parse identity configuration: /);
    });
  });

  describe('loadFromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'identity-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load configuration from disk', () => {
      const configPath = path.join(dir, 'identity.yaml');
      fs.writeFileSync(configPath, 'jwks:\n  url: "https://idp.example.com/certs"\n');

      expect(IdentityConfigLoader.loadFromFile(configPath)).toEqual({
        jwks: { url: 'https://idp.example.com/certs' }
      });
    });

    it('should report the path of a missing file', () => {
      const configPath = path.join(dir, 'missing.yaml');

      expect(() => IdentityConfigLoader.loadFromFile(configPath))
        .toThrow(`Failed to load identity configuration from ${configPath}`);
    });
  });
});

describe('resolveConfigValue', () => {
  it('should prefer a non-empty override', () => {
    expect(resolveConfigValue('https://a.example.com', envWith({ X: 'https://b.example.com' }), 'X'))
      .toBe('https://b.example.com');
  });

  it('should fall back to the explicit value', () => {
    expect(resolveConfigValue('https://a.example.com', envWith({}), 'X')).toBe('https://a.example.com');
    expect(resolveConfigValue('https://a.example.com', envWith({ X: '' }), 'X')).toBe('https://a.example.com');
    expect(resolveConfigValue(undefined, envWith({}), 'X')).toBeUndefined();
  });
});

describe('lookupJwksConfig', () => {
  it('should return null when no url is configured', () => {
    expect(lookupJwksConfig({}, envWith({}))).toBeNull();
  });

  it('should parse the configured url', () => {
    const resolved = lookupJwksConfig(
      { jwks: { url: 'https://idp.example.com/certs', timeoutMs: 2000 } },
      envWith({})
    );

    expect(resolved?.url.toString()).toBe('https://idp.example.com/certs');
    expect(resolved?.timeoutMs).toBe(2000);
  });

  it('should let the environment override the configured url', () => {
    const resolved = lookupJwksConfig(
      { jwks: { url: 'https://idp.example.com/certs' } },
      envWith({ [ENV_IAM_JWKS_URL]: 'https://keys.example.org/jwks.json' })
    );

    expect(ENV_IAM_JWKS_URL).toBe('MINIO_IAM_JWKS_URL');
    expect(resolved?.url.toString()).toBe('https://keys.example.org/jwks.json');
  });

  it('should reject malformed urls', () => {
    expect(() => lookupJwksConfig({ jwks: { url: 'idp.example.com/certs' } }, envWith({})))
      .toThrow(ConfigError);
  });
});
