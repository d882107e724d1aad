import { IdentityConfiguration, EnvLookup } from './types';
import { lookupJwksConfig, processEnv } from './config/identity-config';
import { KeyStore, Transport, CloseResponse, createTransport, drainResponse } from './jwks/key-store';
import { JwtIdentityProvider } from './idp/jwt';

export { ClaimSet, ClaimValue, IdentityConfiguration, JwksConfiguration, ResolvedJwksConfiguration, EnvLookup } from './types';
export * from './errors';
export { IdpProvider, IdpProviderConfiguration } from './idp/base';
export { JwtIdentityProvider, JwtIdentityProviderOptions, JWT_IDENTITY_METHOD, ALLOWED_ALGORITHMS } from './idp/jwt';
export { KeyStore, KeyEndpoint, Transport, CloseResponse, createTransport, drainResponse, decodeKeySet, parseEndpoint } from './jwks/key-store';
export { IdentityConfigLoader, ENV_IAM_JWKS_URL, lookupJwksConfig, resolveConfigValue, processEnv } from './config/identity-config';
export { resolveDuration, clampDuration, sessionExpiry, DEFAULT_SESSION_DURATION, MIN_SESSION_DURATION, MAX_SESSION_DURATION } from './policy/expiry';
export { toClaimSet, toClaimValue, parseClaimSet, toNumericDate, isRecord } from './claims';

export interface JwtIdentityRuntime {
  transport?: Transport;
  closeResponse?: CloseResponse;
  env?: EnvLookup;
  now?: () => number;
}

/**
 * Composes the serializable configuration with the runtime pieces (transport,
 * body cleanup, env lookup, clock). Returns null when no key set URL is
 * configured, in which case web identity tokens cannot be accepted.
 */
export function createJwtIdentityProvider(
  config: IdentityConfiguration,
  runtime: JwtIdentityRuntime = {}
): JwtIdentityProvider | null {
  const jwks = lookupJwksConfig(config, runtime.env ?? processEnv);
  if (!jwks) {
    console.log('⚠️  No JWKS URL configured - web identity validation disabled');
    return null;
  }

  const keyStore = KeyStore.configure(
    jwks.url,
    runtime.transport ?? createTransport(jwks.timeoutMs),
    runtime.closeResponse ?? drainResponse
  );

  console.log(`✅ Web identity provider configured with JWKS ${keyStore.url}`);
  return new JwtIdentityProvider(keyStore, { name: config.name, now: runtime.now });
}
