/**
 * Utility functions for the SOLAPI TypeScript client.
 */

import type { QueryParams } from './client-types';

/**
 * Convert a boolean value to string representation used by the API.
 */
export function boolToStr(value: boolean): string {
  return value ? 'true' : 'false';
}

/**
 * Build query parameters dictionary, filtering null/undefined values and converting booleans.
 */
export function buildParams(params: QueryParams): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) {
      result[key] = typeof value === 'boolean' ? boolToStr(value) : String(value);
    }
  }
  return result;
}

