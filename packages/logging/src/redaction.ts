const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'password',
  'authorization',
  'bearer',
  'cookie',
  'apikey',
  'api_key',
  'credential',
  'sharing_code',
  'activation_url'
] as const;

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

export type Redactor = (value: unknown) => unknown;

const ERROR_FIELDS = ['code', 'source', 'status_code', 'error_code'] as const;

const readErrorField = (error: Error, field: (typeof ERROR_FIELDS)[number]) => {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
};

/**
 * Builds a function that copies a value into a JSON-safe shape, replacing values under credential-like keys.
 * Errors keep name, message, stack and the `code`, `source`, `status_code` and `error_code`
 * fields that token, guard and sharing errors carry.
 */
export const createRedactor = ({extraSensitiveKeys = []}: {extraSensitiveKeys?: string[]} = {}): Redactor => {
  const exactKeys = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));

  const isSensitive = (key: string) => {
    const normalized = normalizeKey(key);
    return exactKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
  };

  const walk = (value: unknown, depth: number, seen: WeakSet<object>): unknown => {
    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof value) {
      case 'undefined':
      case 'string':
      case 'number':
      case 'boolean':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
    }

    if (value === null || typeof value !== 'object') {
      return value;
    }

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }

    if (seen.has(value)) {
      return '[CIRCULAR]';
    }
    seen.add(value);

    if (value instanceof Error) {
      const summary: Record<string, unknown> = {name: value.name, message: value.message};
      for (const field of ERROR_FIELDS) {
        const fieldValue = readErrorField(value, field);
        if (fieldValue !== undefined) {
          summary[field] = fieldValue;
        }
      }
      if (value.stack) {
        summary.stack = value.stack;
      }
      if (value.cause !== undefined) {
        summary.cause = walk(value.cause, depth + 1, seen);
      }
      return summary;
    }

    if (Array.isArray(value)) {
      return value.map(item => walk(item, depth + 1, seen));
    }

    const copy: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = isSensitive(key) ? REDACTED : walk(entry, depth + 1, seen);
    }
    return copy;
  };

  return value => walk(value, 0, new WeakSet<object>());
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => createRedactor(extraSensitiveKeys ? {extraSensitiveKeys} : {})(value);
