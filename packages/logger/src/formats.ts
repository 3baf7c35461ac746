/**
 * @fileoverview Custom winston formats: secret redaction, standard fields
 * and the human-readable line format.
 */

import { format } from 'winston';
import { getRequestContext } from './request-context.js';

/**
 * Field names whose values never reach a transport.
 * Yahoo's `crumb`/`cookie` pair is included alongside the usual credentials.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /crumb/i,
];

export const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'stack']);

/** Fields printed first, in this order, by {@link prettyPrint} */
const LEADING_FIELDS: readonly string[] = ['component', 'ticker', 'policy', 'request_id'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Copy `value` with every sensitive key (at any depth) replaced by `[REDACTED]`.
 * Error instances are passed through for `format.errors` to handle.
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error || value instanceof Date) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Redacts sensitive metadata. Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { baseUrl: 'https://example.test', apiKey: 'test-secret' });
 * // {"level":"info","message":"Provider configured","baseUrl":"https://example.test","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Timestamp, error stacks and the fields of the active request context.
 * Fields passed with the entry win over context fields.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const context = getRequestContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Render one log entry as a single line:
 * `[timestamp] level: message component=... ticker=... key=value`.
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of LEADING_FIELDS) {
    const value = info[key];
    if (value !== undefined && value !== null && value !== '') {
      context.push(`${key}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (CORE_FIELDS.has(key) || LEADING_FIELDS.includes(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  return typeof info['stack'] === 'string' ? `${line}\n${info['stack']}` : line;
}

/**
 * Colorized single-line output for terminals.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
