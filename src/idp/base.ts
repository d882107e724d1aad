import { ClaimSet } from '../types';

export interface IdpProviderConfiguration {
  name: string;
  jwksUrl: string;
}

export abstract class IdpProvider {
  protected config: IdpProviderConfiguration;

  constructor(config: IdpProviderConfiguration) {
    this.config = config;
  }

  /**
   * Validates a bearer token and returns its claims, with `exp` bounded by the
   * session duration the caller asked for (seconds, as a decimal string).
   */
  abstract validateToken(token: string, requestedDuration?: string): Promise<ClaimSet>;

  /**
   * Short identifier the surrounding IAM layer uses to tag credentials issued through this provider.
   */
  abstract id(): string;

  // Optional health check method for providers
  healthCheck?(): Promise<boolean>;

  getName(): string {
    return this.config.name;
  }

  getJwksUrl(): string {
    return this.config.jwksUrl;
  }
}
