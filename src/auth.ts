/**
 * HMAC-SHA256 request signing.
 */

import { createHmac, randomBytes } from 'crypto';
import { formatRFC3339 } from 'date-fns';

import { AUTH_SCHEME, SALT_BYTES } from './constants';

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

export interface AuthorizationParts {
  apiKey: string;
  date: string;
  salt: string;
  signature: string;
}

/**
 * Random hex salt. Never shorter than 20 bytes.
 */
export function createSalt(bytes: number = SALT_BYTES): string {
  return randomBytes(Math.max(bytes, SALT_BYTES)).toString('hex');
}

export function formatDate(date: Date): string {
  return formatRFC3339(date);
}

/**
 * hex(HMAC-SHA256(apiSecret, date + salt))
 */
export function sign(apiSecret: string, date: string, salt: string): string {
  return createHmac('sha256', apiSecret).update(date + salt).digest('hex');
}

export function buildAuthorization(parts: AuthorizationParts): string {
  return (
    `${AUTH_SCHEME} apiKey=${parts.apiKey}, date=${parts.date}, ` +
    `salt=${parts.salt}, signature=${parts.signature}`
  );
}

/**
 * Build a fresh Authorization header value. Every call draws a new salt.
 */
export function getAuthorization(credentials: Credentials, now: Date = new Date()): string {
  const salt = createSalt();
  const date = formatDate(now);
  const signature = sign(credentials.apiSecret, date, salt);
  return buildAuthorization({ apiKey: credentials.apiKey, date, salt, signature });
}

/**
 * Split an Authorization header back into its parts. Returns null when the
 * value does not use the HMAC-SHA256 scheme.
 */
export function parseAuthorization(header: string): AuthorizationParts | null {
  const prefix = `${AUTH_SCHEME} `;
  if (!header.startsWith(prefix)) {
    return null;
  }
  const fields = new Map<string, string>();
  for (const pair of header.slice(prefix.length).split(', ')) {
    const index = pair.indexOf('=');
    if (index === -1) {
      return null;
    }
    fields.set(pair.slice(0, index), pair.slice(index + 1));
  }
  const apiKey = fields.get('apiKey');
  const date = fields.get('date');
  const salt = fields.get('salt');
  const signature = fields.get('signature');
  if (apiKey === undefined || date === undefined || salt === undefined || signature === undefined) {
    return null;
  }
  return { apiKey, date, salt, signature };
}
