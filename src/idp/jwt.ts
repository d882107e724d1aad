import * as jwt from 'jsonwebtoken';
import { compactVerify } from 'jose';
import { IdpProvider } from './base';
import { ClaimSet } from '../types';
import { KeyStore } from '../jwks/key-store';
import { parseClaimSet, toNumericDate } from '../claims';
import { resolveDuration, sessionExpiry } from '../policy/expiry';
import {
  AlgorithmNotAllowedError,
  InvalidDurationError,
  MalformedTokenError,
  MissingKidHeaderError,
  SignatureInvalidError,
  TokenExpiredError
} from '../errors';

export const JWT_IDENTITY_METHOD = 'jwt';

// Asymmetric families only: accepting HS* would let a public key be used as an HMAC secret.
export const ALLOWED_ALGORITHMS: readonly string[] = ['RS256', 'RS384', 'RS512', 'ES256', 'ES384', 'ES512'];

export interface JwtIdentityProviderOptions {
  name?: string;
  now?: () => number; // Milliseconds since the epoch
}

/**
 * Validates OpenID Connect tokens against a provider's JWKS and bounds the
 * session that may be derived from them.
 */
export class JwtIdentityProvider extends IdpProvider {
  private readonly keyStore: KeyStore;
  private readonly now: () => number;

  constructor(keyStore: KeyStore, options: JwtIdentityProviderOptions = {}) {
    super({ name: options.name ?? JWT_IDENTITY_METHOD, jwksUrl: keyStore.url });
    this.keyStore = keyStore;
    this.now = options.now ?? Date.now;
  }

  id(): string {
    return JWT_IDENTITY_METHOD;
  }

  async validateToken(token: string, requestedDuration = ''): Promise<ClaimSet> {
    try {
      const claims = await this.verify(token, requestedDuration);
      console.log(`✅ JWT validation successful for subject: ${typeof claims.sub === 'string' ? claims.sub : '(none)'}`);
      return claims;
    } catch (error) {
      console.error(`❌ ${this.getName()} token validation failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    return await this.keyStore.healthCheck();
  }

  private async verify(token: string, requestedDuration: string): Promise<ClaimSet> {
    const kid = this.readKeyId(token);
    const payload = await this.verifyWithRefresh(token, kid);

    const claims = parseClaimSet(payload);
    if (!claims) {
      throw new MalformedTokenError('Token payload is not a JSON object');
    }

    const nowMs = this.now();
    this.checkTemporalClaims(claims, Math.floor(nowMs / 1000));

    const expiresAt = toNumericDate(claims.exp);
    if (expiresAt === undefined) {
      throw new InvalidDurationError(`Invalid exp claim: ${JSON.stringify(claims.exp) ?? 'undefined'}`);
    }

    const duration = resolveDuration(requestedDuration);

    // A derived session must never outlive the token it came from
    if (expiresAt < sessionExpiry(expiresAt, duration, nowMs)) {
      claims.exp = expiresAt;
    }

    return claims;
  }

  /**
   * Reads the unverified header: algorithm allow-list first, then the key id.
   */
  private readKeyId(token: string): string {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      throw new MalformedTokenError('Invalid JWT token format');
    }

    const { alg, kid } = decoded.header;
    if (typeof alg !== 'string' || !ALLOWED_ALGORITHMS.includes(alg)) {
      throw new AlgorithmNotAllowedError(String(alg));
    }
    if (typeof kid !== 'string') {
      throw new MissingKidHeaderError(kid);
    }
    return kid;
  }

  private async verifyWithRefresh(token: string, kid: string): Promise<string> {
    try {
      return await this.verifySignature(token, kid);
    } catch (error) {
      if (!(error instanceof SignatureInvalidError)) {
        throw error;
      }
      console.log(`🔄 ${error.message}; refreshing keys and retrying once`);
    }

    await this.keyStore.refresh();
    return await this.verifySignature(token, kid);
  }

  private async verifySignature(token: string, kid: string): Promise<string> {
    const key = this.keyStore.lookup(kid);
    if (!key) {
      throw new SignatureInvalidError(`No signing key found for kid "${kid}"`);
    }

    try {
      const { payload } = await compactVerify(token, key, { algorithms: [...ALLOWED_ALGORITHMS] });
      return Buffer.from(payload).toString('utf8');
    } catch (error) {
      throw new SignatureInvalidError(
        `Signature verification failed for kid "${kid}": ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  private checkTemporalClaims(claims: ClaimSet, now: number): void {
    const expiresAt = toNumericDate(claims.exp);
    if (expiresAt !== undefined && now > expiresAt) {
      throw new TokenExpiredError('Token is expired');
    }

    const notBefore = toNumericDate(claims.nbf);
    if (notBefore !== undefined && now < notBefore) {
      throw new TokenExpiredError('Token is not valid yet');
    }

    const issuedAt = toNumericDate(claims.iat);
    if (issuedAt !== undefined && now < issuedAt) {
      throw new TokenExpiredError('Token used before issued');
    }
  }
}
