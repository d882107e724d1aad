import * as yaml from 'js-yaml';
import * as fs from 'fs';
import { ConfigError } from '../errors';
import { isRecord } from '../claims';
import { parseEndpoint } from '../jwks/key-store';
import { EnvLookup, IdentityConfiguration, ResolvedJwksConfiguration } from '../types';

/**
 * Overrides the configured key set URL when set. The name is the one the
 * storage server already reads for its web identity JWKS, kept so existing
 * deployments need no new variable.
 */
export const ENV_IAM_JWKS_URL = 'MINIO_IAM_JWKS_URL';

export const processEnv: EnvLookup = (name) => process.env[name];

/**
 * Returns the value of the `name` override when the lookup yields a
 * non-empty string, the explicit value otherwise.
 */
export function resolveConfigValue(
  explicit: string | undefined,
  lookup: EnvLookup,
  name: string
): string | undefined {
  const override = lookup(name);
  if (override !== undefined && override !== '') {
    return override;
  }
  return explicit;
}

/**
 * Resolves the effective key set endpoint. Returns null when no URL is
 * configured anywhere, meaning web identity validation is disabled.
 */
export function lookupJwksConfig(
  config: IdentityConfiguration,
  lookup: EnvLookup = processEnv
): ResolvedJwksConfiguration | null {
  const url = resolveConfigValue(config.jwks?.url, lookup, ENV_IAM_JWKS_URL);
  if (!url) {
    return null;
  }

  return {
    url: parseEndpoint(url),
    timeoutMs: config.jwks?.timeoutMs
  };
}

export class IdentityConfigLoader {
  static loadFromFile(configPath: string): IdentityConfiguration {
    let configContent: string;
    try {
      configContent = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
      throw new ConfigError(
        `Failed to load identity configuration from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    try {
      return this.parse(configContent);
    } catch (error) {
      if (error instanceof Error) {
        throw new ConfigError(`Failed to load identity configuration from ${configPath}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  static loadFromString(yamlContent: string): IdentityConfiguration {
    try {
      return this.parse(yamlContent);
    } catch (error) {
      if (error instanceof Error) {
        throw new ConfigError(`Failed to parse identity configuration: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private static parse(yamlContent: string): IdentityConfiguration {
    const raw: unknown = yaml.load(yamlContent);

    // Handle empty or null config
    if (raw === undefined || raw === null) {
      return {};
    }
    if (!isRecord(raw)) {
      throw new Error('Invalid configuration: expected a mapping at the top level');
    }

    const config: IdentityConfiguration = {};

    if (raw.name !== undefined) {
      if (typeof raw.name !== 'string') {
        throw new Error('Invalid configuration: "name" must be a string');
      }
      config.name = raw.name;
    }

    if (raw.jwks !== undefined && raw.jwks !== null) {
      if (!isRecord(raw.jwks)) {
        throw new Error('Invalid configuration: "jwks" must be an object');
      }
      const { url, timeoutMs } = raw.jwks;

      config.jwks = {};
      if (url !== undefined) {
        if (typeof url !== 'string') {
          throw new Error('Invalid configuration: "jwks.url" must be a string');
        }
        config.jwks.url = url;
      }
      if (timeoutMs !== undefined) {
        if (typeof timeoutMs !== 'number' || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
          throw new Error('Invalid configuration: "jwks.timeoutMs" must be a positive integer');
        }
        config.jwks.timeoutMs = timeoutMs;
      }
    }

    return config;
  }
}
