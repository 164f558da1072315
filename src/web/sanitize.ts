/**
 * Log Redaction
 *
 * Prepares values for console output. Credentials are replaced outright;
 * client identity fields are masked so a log line can still be matched to a
 * support request without revealing the full address or name.
 *
 * - Arrays become '[Array(N)]' summaries (elements are never inspected)
 * - Depth is capped at MAX_DEPTH
 */

/** Field names whose values must never appear in logs */
export const SECRET_FIELDS: ReadonlySet<string> = new Set([
  'clientSecret',
  'apiKey',
  'accessToken',
  'connectToken',
  'password',
  'secret',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * "ana.silva@example.com" -> "an***@example.com"
 */
export function maskEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at < 1) return REDACTED;
  return `${email.slice(0, Math.min(2, at))}***${email.slice(at)}`;
}

/**
 * "Ana Silva" -> "A. S."
 */
export function maskName(name: string): string {
  const initials = name.trim().split(/\s+/).filter(Boolean).map(part => `${part[0]}.`);
  return initials.length > 0 ? initials.join(' ') : REDACTED;
}

/**
 * Recursively sanitize a value for logging.
 *
 * @returns A copy with secrets redacted and identity fields masked
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.has(key)) {
      result[key] = REDACTED;
    } else if (key === 'email' && typeof value === 'string') {
      result[key] = maskEmail(value);
    } else if (key === 'name' && typeof value === 'string') {
      result[key] = maskName(value);
    } else {
      result[key] = sanitizeForLog(value, depth + 1);
    }
  }

  return result;
}
