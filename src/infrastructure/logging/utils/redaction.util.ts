const REDACT_KEYS = new Set([
  'password',
  'pass',
  'pwd',
  'token',
  'access_token',
  'refresh_token',
  'authorization',
  'apikey',
  'api_key',
  'openaiapikey',
  'client_secret',
  'secret',
  'cookie',
  'set-cookie',
  'auth',
  'credentials',
]);

export const REDACTED = '[REDACTED]';

export function shouldRedact(key: string): boolean {
  return REDACT_KEYS.has(key.toLowerCase());
}

export function deepRedact(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map((v) => deepRedact(v));
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      result[key] = shouldRedact(key) ? REDACTED : deepRedact(v);
    }
    return result;
  }
  return value;
}
