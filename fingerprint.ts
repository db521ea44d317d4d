import { createHash } from 'node:crypto';
import type { ParameterSet } from './types';

function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map(sortKeys);

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(Reflect.get(value, key));
  }
  return sorted;
}

/**
 * SHA-256 of the parameter values with keys sorted, so two sets holding the
 * same values in a different key order share a fingerprint.
 */
export function fingerprintParameters(params: ParameterSet): string {
  const json = JSON.stringify(sortKeys(params));
  return createHash('sha256').update(json, 'utf8').digest('hex');
}
