/**
 * Log masking for source locations and request metadata.
 * Source URLs may carry credentials (basic auth or signed query parameters).
 */

import { logger } from '../core/logger';

const SENSITIVE_PATTERNS = {
  // user:password@ in a URL
  urlCredentials: /(\b[a-z][a-z0-9+.-]*:\/\/)([^\s:/@]+):([^\s/@]+)@/gi,
  // token=..., sig=..., key=... query parameters
  queryToken: /([?&](?:token|access_token|api_key|apikey|key|sig|signature|x-amz-signature)=)([^&\s#]+)/gi,
  // Email addresses
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
};

const SENSITIVE_FIELDS = ['authorization', 'password', 'secret', 'token', 'apikey', 'api_key'];

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Mask credentials in a string. Hosts and paths stay readable.
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) return text;

  return text
    .replace(SENSITIVE_PATTERNS.urlCredentials, (_match, scheme: string) => `${scheme}${maskChar.repeat(8)}@`)
    .replace(SENSITIVE_PATTERNS.queryToken, (_match, param: string) => `${param}${maskChar.repeat(8)}`)
    .replace(SENSITIVE_PATTERNS.email, (match) => {
      const [local, domain] = match.split('@');
      return `${maskChar.repeat(Math.min(local.length, 3))}***@${domain}`;
    });
}

/**
 * Copy of `value` with sensitive fields masked and sensitive patterns
 * removed from every string.
 */
export function sanitizeObject(value: unknown): unknown {
  if (typeof value === 'string') return maskSensitiveData(value);
  if (Array.isArray(value)) return value.map(item => sanitizeObject(item));
  if (value === null || typeof value !== 'object' || value instanceof Date) return value;

  const sanitized: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_FIELDS.some(name => lowerKey.includes(name));
    sanitized[key] = isSensitive ? '***MASKED***' : sanitizeObject(field);
  }
  return sanitized;
}

/**
 * Secure logging - masks sensitive data before logging
 */
export function secureLog(message: string, meta: Record<string, unknown> = {}, level: LogLevel = 'info'): void {
  const sanitized = sanitizeObject(meta);
  const fields = sanitized !== null && typeof sanitized === 'object' ? sanitized : {};
  logger[level](maskSensitiveData(message), fields);
}
