const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

// Matched against keys lower-cased with separators removed, so `Set-Cookie`,
// `set_cookie` and `setCookie` all land on `setcookie`. `clientCertCn` does not
// match `certificate` and stays readable.
const CREDENTIAL_KEY_FRAGMENTS = [
  'authorization',
  'cookie',
  'token',
  'secret',
  'password',
  'passphrase',
  'apikey',
  'privatekey',
  'certificate'
] as const;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9]/gu, '');

const describeBody = (body: unknown) => {
  if (body === undefined || body === null) {
    return body;
  }

  if (body instanceof Uint8Array) {
    return `[BODY ${body.byteLength} bytes]`;
  }

  if (typeof body === 'string') {
    return `[BODY ${Buffer.byteLength(body)} bytes]`;
  }

  return REDACTED;
};

export type LogRedactor = (value: unknown) => unknown;

/**
 * Builds a function that turns arbitrary metadata into a JSON-safe copy.
 * Credentials (headers, cookies, certificates, keys) are replaced, request and
 * response bodies are reduced to their size, and bigints, symbols, dates,
 * errors, buffers, patterns and cycles get a printable form.
 */
export const createLogRedactor = ({extraSensitiveKeys = []}: {extraSensitiveKeys?: readonly string[]} = {}): LogRedactor => {
  const extraKeys = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));

  const isCredentialKey = (normalizedKey: string) =>
    extraKeys.has(normalizedKey) || CREDENTIAL_KEY_FRAGMENTS.some(fragment => normalizedKey.includes(fragment));

  const visit = (value: unknown, depth: number, ancestors: WeakSet<object>): unknown => {
    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'undefined':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
    }

    if (value === null) {
      return null;
    }

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }

    if (value instanceof Error) {
      return {name: value.name, message: value.message, ...(value.stack ? {stack: value.stack} : {})};
    }

    if (value instanceof Uint8Array) {
      return `[BINARY ${value.byteLength} bytes]`;
    }

    if (value instanceof RegExp) {
      return value.toString();
    }

    if (ancestors.has(value)) {
      return '[CIRCULAR]';
    }

    ancestors.add(value);
    const copy = Array.isArray(value)
      ? value.map(item => visit(item, depth + 1, ancestors))
      : Object.fromEntries(
          Object.entries(value).map(([key, entry]: [string, unknown]) => {
            const normalizedKey = normalizeKey(key);
            if (normalizedKey === 'body') {
              return [key, describeBody(entry)];
            }

            return [key, isCredentialKey(normalizedKey) ? REDACTED : visit(entry, depth + 1, ancestors)];
          })
        );
    ancestors.delete(value);

    return copy;
  };

  return value => visit(value, 0, new WeakSet<object>());
};

export const redactForLog = (value: unknown, options?: {extraSensitiveKeys?: readonly string[]}) =>
  createLogRedactor(options)(value);
