import fetch, { Response } from 'node-fetch';
import { importJWK, JWK, KeyLike } from 'jose';
import { ConfigError, DecodeError, HttpStatusError, NetworkError } from '../errors';
import { isRecord } from '../claims';

export type Transport = (url: string) => Promise<Response>;
export type CloseResponse = (response: Response) => void;

export interface KeyEndpoint {
  readonly url: URL;
  readonly transport: Transport;
  readonly closeResponse: CloseResponse;
}

const SUPPORTED_KEY_TYPES = ['RSA', 'EC'];

// Public members only; private key material in a published set is never imported.
const PUBLIC_JWK_MEMBERS = ['kid', 'alg', 'use', 'n', 'e', 'crv', 'x', 'y'] as const;

export function createTransport(timeoutMs?: number): Transport {
  return (url: string) => fetch(url, timeoutMs ? { timeout: timeoutMs } : {});
}

export const drainResponse: CloseResponse = (response) => {
  // Responses built without a body carry a null stream
  if (!response.bodyUsed && response.body) {
    response.body.resume();
  }
};

export function parseEndpoint(endpoint: string | URL): URL {
  let url: URL;
  try {
    url = new URL(endpoint.toString());
  } catch (error) {
    throw new ConfigError(`Invalid JWKS URL "${endpoint.toString()}"`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Invalid JWKS URL "${url.toString()}": unsupported scheme ${url.protocol}`);
  }
  if (!url.hostname) {
    throw new ConfigError(`Invalid JWKS URL "${url.toString()}": missing host`);
  }
  return url;
}

/**
 * In-memory view of an identity provider's published signing keys.
 *
 * The set starts empty and is only ever replaced as a whole by `refresh()`,
 * so a lookup sees either the previous set or the new one. Refreshes that
 * overlap share a single request.
 */
export class KeyStore {
  private keys: ReadonlyMap<string, KeyLike> = new Map();
  private inFlight: Promise<void> | null = null;

  constructor(private readonly endpoint: KeyEndpoint) {}

  static configure(
    endpoint: string | URL,
    transport: Transport = createTransport(),
    closeResponse: CloseResponse = drainResponse
  ): KeyStore {
    return new KeyStore({ url: parseEndpoint(endpoint), transport, closeResponse });
  }

  get url(): string {
    return this.endpoint.url.toString();
  }

  get size(): number {
    return this.keys.size;
  }

  keyIds(): string[] {
    return Array.from(this.keys.keys());
  }

  lookup(kid: string): KeyLike | undefined {
    return this.keys.get(kid);
  }

  refresh(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.fetchKeys().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.refresh();
      return this.keys.size > 0;
    } catch (error) {
      console.warn(`JWKS health check failed for ${this.url}: ${error}`);
      return false;
    }
  }

  private async fetchKeys(): Promise<void> {
    console.log(`🔄 Refreshing JWKS from ${this.url}`);

    let response: Response;
    try {
      response = await this.endpoint.transport(this.url);
    } catch (error) {
      throw new NetworkError(
        `JWKS request to ${this.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    try {
      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText);
      }

      let document: unknown;
      try {
        document = await response.json();
      } catch (error) {
        throw new DecodeError('JWKS response is not valid JSON', { cause: error });
      }

      const keys = await decodeKeySet(document);
      this.keys = keys;
      console.log(`✅ Loaded ${keys.size} signing keys from ${this.url}`);
    } finally {
      this.endpoint.closeResponse(response);
    }
  }
}

/**
 * Decodes a whole key set document. Any bad entry fails the whole set.
 */
export async function decodeKeySet(document: unknown): Promise<Map<string, KeyLike>> {
  const entries: unknown = isRecord(document) ? document.keys : undefined;
  if (!Array.isArray(entries)) {
    throw new DecodeError('JWKS document must contain a "keys" array');
  }

  const keys = new Map<string, KeyLike>();
  for (const [index, entry] of entries.entries()) {
    if (!isRecord(entry)) {
      throw new DecodeError(`JWKS entry at index ${index} must be an object`);
    }
    const { kid } = entry;
    if (typeof kid !== 'string') {
      throw new DecodeError(`JWKS entry at index ${index}: missing or invalid "kid"`);
    }
    keys.set(kid, await decodePublicKey(entry, kid));
  }
  return keys;
}

async function decodePublicKey(entry: Record<string, unknown>, kid: string): Promise<KeyLike> {
  const { kty } = entry;
  if (typeof kty !== 'string' || !SUPPORTED_KEY_TYPES.includes(kty)) {
    throw new DecodeError(`JWKS key "${kid}": unsupported key type ${typeof kty === 'string' ? kty : '(none)'}`);
  }

  const jwk: JWK = { kty };
  for (const member of PUBLIC_JWK_MEMBERS) {
    const value = entry[member];
    if (typeof value === 'string') {
      jwk[member] = value;
    }
  }

  let key: KeyLike | Uint8Array;
  try {
    key = await importJWK(jwk);
  } catch (error) {
    throw new DecodeError(
      `JWKS key "${kid}" could not be decoded: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  if (key instanceof Uint8Array) {
    throw new DecodeError(`JWKS key "${kid}" is not a public key`);
  }
  return key;
}
