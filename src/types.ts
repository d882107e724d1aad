export type ClaimValue =
  | string
  | number
  | boolean
  | null
  | ClaimValue[]
  | { [name: string]: ClaimValue };

export interface ClaimSet {
  [name: string]: ClaimValue;
}

export interface JwksConfiguration {
  url?: string;
  timeoutMs?: number; // Passed to the default transport as a request deadline
}

export interface IdentityConfiguration {
  name?: string;
  jwks?: JwksConfiguration;
}

/**
 * Effective key set endpoint after env overrides and URL validation.
 */
export interface ResolvedJwksConfiguration {
  readonly url: URL;
  readonly timeoutMs?: number;
}

export type EnvLookup = (name: string) => string | undefined;
