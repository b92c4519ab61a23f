import type { HeaderMap, Structured } from './types';

export const MASK = '********';

export function isStructured(value: unknown): value is Structured {
  return typeof value === 'object' && value !== null;
}

/**
 * Whether a value counts as present for redaction and side-channel lookups.
 * Empty strings, `"0"`, zero, `false`, `null` and empty containers do not.
 */
export function isFilled(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '' || value === '0') {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isStructured(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

function hasKey(holder: Structured, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(holder, key);
}

function readKey(holder: Structured, key: string): unknown {
  if (Array.isArray(holder)) {
    return /^\d+$/.test(key) ? holder[Number(key)] : undefined;
  }
  return holder[key];
}

function writeKey(holder: Structured, key: string, value: unknown): void {
  if (Array.isArray(holder)) {
    holder[Number(key)] = value;
  } else {
    holder[key] = value;
  }
}

interface Location {
  holder: Structured;
  key: string;
}

function locate(root: Structured, path: string): Location | undefined {
  if (hasKey(root, path)) {
    return { holder: root, key: path };
  }

  const segments = path.split('.');
  const key = segments.pop();
  if (key === undefined) {
    return undefined;
  }

  let holder: Structured = root;
  for (const segment of segments) {
    const next = hasKey(holder, segment) ? readKey(holder, segment) : undefined;
    if (!isStructured(next)) {
      return undefined;
    }
    holder = next;
  }

  return hasKey(holder, key) ? { holder, key } : undefined;
}

/**
 * Masks every dotted path that resolves to a filled value. Returns a copy;
 * the input is left untouched.
 */
export function hideParameters<T extends Structured>(payload: T, hidden: readonly string[]): T {
  const copy = structuredClone(payload);

  for (const path of hidden) {
    const location = locate(copy, path);
    if (location && isFilled(readKey(location.holder, location.key))) {
      writeKey(location.holder, location.key, MASK);
    }
  }

  return copy;
}

/**
 * Redacts sensitive headers from a headers map
 */
export function redactHeaders(headers: HeaderMap, hidden: readonly string[]): HeaderMap {
  const redacted: HeaderMap = {};

  for (const [key, values] of Object.entries(headers)) {
    redacted[key] = hidden.includes(key.toLowerCase()) ? [MASK] : [...values];
  }

  return redacted;
}
