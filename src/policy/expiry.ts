import { InvalidDurationError } from '../errors';

export const DEFAULT_SESSION_DURATION = 3600; // 1 hour
export const MIN_SESSION_DURATION = 900; // 15 minutes
export const MAX_SESSION_DURATION = 43200; // 12 hours

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Resolves the session duration, in seconds, a caller asked for.
 * An empty request yields the one hour default.
 */
export function resolveDuration(requested?: string): number {
  if (requested === undefined || requested === '') {
    return DEFAULT_SESSION_DURATION;
  }

  if (!INTEGER_PATTERN.test(requested)) {
    throw new InvalidDurationError(`Invalid duration "${requested}": not a base-10 integer`);
  }

  const seconds = Number(requested);
  if (seconds < MIN_SESSION_DURATION || seconds > MAX_SESSION_DURATION) {
    throw new InvalidDurationError(
      `Invalid duration ${seconds}: must be between ${MIN_SESSION_DURATION} and ${MAX_SESSION_DURATION} seconds`
    );
  }

  return seconds;
}

/**
 * Shortens `duration` to whatever lifetime the token has left.
 * The result may be fractional (now is tracked in milliseconds).
 */
export function clampDuration(expiresAt: number, duration: number, nowMs: number): number {
  return clampDurationMs(expiresAt, duration, nowMs) / 1000;
}

/**
 * Unix time, in whole seconds, at which a session derived from the token ends.
 */
export function sessionExpiry(expiresAt: number, duration: number, nowMs: number): number {
  return Math.floor((nowMs + clampDurationMs(expiresAt, duration, nowMs)) / 1000);
}

function clampDurationMs(expiresAt: number, duration: number, nowMs: number): number {
  const remainingMs = expiresAt * 1000 - nowMs;
  const durationMs = duration * 1000;
  return remainingMs < durationMs ? remainingMs : durationMs;
}
