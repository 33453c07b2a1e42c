import type { DelayPolicy } from '../types/crawl-spec.js';
import { ConfigurationError } from './errors.js';

const SECONDS = '(\\d+(?:\\.\\d+)?)';

/**
 * Parse a politeness delay.
 * Supports formats like: 0 / none (no delay), 1.5 (fixed seconds), 0.5-2 (random range in seconds)
 */
export function parseDelayPolicy(input: string): DelayPolicy {
  const value = input.trim().toLowerCase();
  if (value === '' || value === 'none') {
    return { kind: 'none' };
  }

  const fixed = value.match(new RegExp(`^${SECONDS}s?$`));
  if (fixed) {
    const seconds = parseFloat(fixed[1]);
    return seconds === 0 ? { kind: 'none' } : { kind: 'fixed', seconds };
  }

  const range = value.match(new RegExp(`^${SECONDS}\\s*-\\s*${SECONDS}s?$`));
  if (range) {
    const min = parseFloat(range[1]);
    const max = parseFloat(range[2]);
    if (min > max) {
      throw new ConfigurationError(`Invalid delay range: ${input} (minimum is greater than maximum)`);
    }
    if (max === 0) return { kind: 'none' };
    return min === max ? { kind: 'fixed', seconds: min } : { kind: 'range', min, max };
  }

  throw new ConfigurationError(`Invalid delay format: ${input}. Use formats like 0, 1.5, 0.5-2`);
}

export function formatDelayPolicy(policy: DelayPolicy): string {
  switch (policy.kind) {
    case 'none':
      return 'none';
    case 'fixed':
      return `${policy.seconds}s`;
    case 'range':
      return `${policy.min}-${policy.max}s`;
  }
}

/**
 * Parse a timeout into milliseconds.
 * Supports formats like: 30 (seconds), 30s, 1500ms, 2m
 */
export function parseDurationMs(duration: string): number {
  const match = duration.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m)?$/);
  if (!match) {
    throw new ConfigurationError(`Invalid duration format: ${duration}. Use formats like 30, 30s, 1500ms, 2m`);
  }

  const [, value, unit] = match;
  const amount = parseFloat(value);

  switch (unit) {
    case 'ms':
      return Math.round(amount);
    case 'm':
      return Math.round(amount * 60 * 1000);
    default:
      return Math.round(amount * 1000);
  }
}
