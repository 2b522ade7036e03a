/**
 * Sensitive Data Redaction Utility
 *
 * Provider settings carry API keys next to harmless values such as model ids
 * and base URLs. Anything that logs a settings payload goes through
 * redactObject first.
 *
 * Usage:
 *   import { redactObject } from '../utils/redact';
 *   log.debug('Creating provider', { settings: redactObject(settings) });
 */

/** Placeholder value for redacted content */
export const REDACTED = '[REDACTED]';

/** Fields that should always be redacted (case-insensitive) */
const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credentials',
]);

/** Patterns that indicate sensitive data */
const SENSITIVE_PATTERNS = [/password/i, /secret/i, /token/i, /api[_-]?key/i, /credential/i];

function isSensitiveField(fieldName: string): boolean {
  if (SENSITIVE_FIELDS.has(fieldName.toLowerCase())) {
    return true;
  }
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redact a single value
 *
 * @example
 * redact('sk-test');  // '[REDACTED]'
 * redact(undefined);  // '[NOT SET]'
 */
export function redact(value: unknown, showPresence: boolean = true): string {
  if (!showPresence) {
    return REDACTED;
  }

  if (value === null || value === undefined || value === '') {
    return '[NOT SET]';
  }

  return REDACTED;
}

/**
 * Redact sensitive fields from an object, recursing into nested objects
 *
 * @example
 * redactObject({ backend_url: 'https://api.openai.com/v1', openai_api_key: 'test-key' });
 * // { backend_url: 'https://api.openai.com/v1', openai_api_key: '[REDACTED]' }
 */
export function redactObject(
  obj: Readonly<Record<string, unknown>>,
  additionalFields: string[] = []
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const additionalSet = new Set(additionalFields.map((f) => f.toLowerCase()));

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveField(key) || additionalSet.has(key.toLowerCase())) {
      result[key] = redact(value);
    } else if (isPlainRecord(value)) {
      result[key] = redactObject(value, additionalFields);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Create a safe error object for logging
 */
export function safeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { message: String(error) };
}
