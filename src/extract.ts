import type { SizeMeasure } from './config';
import { isFilled, isStructured } from './redact';
import type { Payload, Structured, TransportKind } from './types';

export const EMPTY_RESPONSE = 'Empty Response';
export const HTML_RESPONSE = 'HTML Response';
export const PURGED = 'Purged By Capture Scope';

export interface ExtractOptions {
  sizeLimitKb: number;
  sizeMeasure: SizeMeasure;
  /** Reads a payload carried outside the body, e.g. a decoded gRPC message. */
  outOfBand?: () => unknown;
}

export function measure(content: string, unit: SizeMeasure): number {
  if (unit === 'bytes') {
    return Buffer.byteLength(content, 'utf8');
  }
  let count = 0;
  for (const _char of content) {
    count++;
  }
  return count;
}

export function contentWithinLimits(content: string, options: Pick<ExtractOptions, 'sizeLimitKb' | 'sizeMeasure'>): boolean {
  return measure(content, options.sizeMeasure) / 1000 <= options.sizeLimitKb;
}

function parseStructured(content: string): Structured | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(content);
  } catch {
    return undefined;
  }
  return isStructured(decoded) ? decoded : undefined;
}

// Cheap shape test for bodies too large to decode
function looksStructured(content: string): boolean {
  const trimmed = content.trim();
  const first = trimmed.charAt(0);
  const last = trimmed.charAt(trimmed.length - 1);
  return (first === '{' && last === '}') || (first === '[' && last === ']');
}

/**
 * Plain objects and arrays only; Buffers, class instances and the like are
 * not payloads.
 */
export function isPlainStructured(value: unknown): value is Structured {
  if (Array.isArray(value)) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toPayload(value: unknown): Payload {
  if (typeof value === 'string' || isPlainStructured(value)) {
    return value;
  }
  return String(value);
}

/**
 * Turns a response body into something worth storing. First match wins:
 * empty, JSON object/array, text/plain, gRPC side channel, then opaque.
 * A `null` body was a stream and is never read.
 */
export function extractResponsePayload(
  content: string | null,
  contentType: string,
  options: ExtractOptions
): Payload {
  if (content !== null) {
    if (content.length === 0) {
      return EMPTY_RESPONSE;
    }

    if (contentWithinLimits(content, options)) {
      const structured = parseStructured(content);
      if (structured !== undefined) {
        return structured;
      }
    } else if (looksStructured(content)) {
      return PURGED;
    }
  }

  const type = contentType.toLowerCase();

  if (content !== null && type.startsWith('text/plain')) {
    return contentWithinLimits(content, options) ? content : PURGED;
  }

  if (type.includes('application/grpc')) {
    const payload = options.outOfBand?.();
    return isFilled(payload) ? toPayload(payload) : PURGED;
  }

  return HTML_RESPONSE;
}

export interface RequestInput {
  query: unknown;
  body: unknown;
}

/**
 * Query parameters merged over the parsed body. gRPC requests have no
 * readable body, so their payload comes from the side channel instead.
 * Payloads whose JSON form exceeds the limit are purged.
 */
export function extractRequestPayload(request: RequestInput, transport: TransportKind, options: ExtractOptions): Payload {
  let payload: Payload;

  if (transport === 'grpc') {
    const sideChannel = options.outOfBand?.();
    payload = isFilled(sideChannel) ? toPayload(sideChannel) : '';
  } else {
    const data = isPlainStructured(request.body) ? request.body : {};
    const query = isPlainStructured(request.query) ? request.query : {};
    payload = { ...data, ...query };
  }

  const serialized = typeof payload === 'string' ? payload : JSON.stringify(payload);
  return contentWithinLimits(serialized, options) ? payload : PURGED;
}
