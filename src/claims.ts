import { ClaimSet, ClaimValue } from './types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a typed claim value out of freshly parsed JSON.
 * Returns undefined for anything JSON cannot produce (functions, undefined, non-finite numbers).
 */
export function toClaimValue(value: unknown): ClaimValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: ClaimValue[] = [];
    for (const item of value) {
      const claim = toClaimValue(item);
      if (claim === undefined) {
        return undefined;
      }
      items.push(claim);
    }
    return items;
  }
  if (typeof value === 'object') {
    return toClaimSet(value);
  }
  return undefined;
}

export function toClaimSet(value: unknown): ClaimSet | undefined {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }

  const claims: ClaimSet = {};
  for (const [name, raw] of Object.entries(value)) {
    const claim = toClaimValue(raw);
    if (claim === undefined) {
      return undefined;
    }
    claims[name] = claim;
  }
  return claims;
}

/**
 * Two-phase decode of a token payload: parse into `unknown`, then construct the claim set.
 */
export function parseClaimSet(json: string): ClaimSet | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return undefined;
  }
  return toClaimSet(parsed);
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Coerces a NumericDate claim to whole seconds.
 * Accepts numbers (truncated toward zero) and decimal integer strings.
 */
export function toNumericDate(value: ClaimValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    return Number(value);
  }
  return undefined;
}
