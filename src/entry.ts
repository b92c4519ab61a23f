import { ulid } from 'ulid';
import type { CaptureEntry, Clock, HeaderMap, MemoryProbe, Payload, RequestFacts } from './types';

export const systemClock: Clock = {
  now: () => performance.now(),
};

export const processMemory: MemoryProbe = {
  // maxRSS is reported in kilobytes
  peakMegabytes: () => process.resourceUsage().maxRSS / 1024,
};

export interface EntryInput {
  batchId: string;
  request: RequestFacts;
  responseStatus: number;
  headers: HeaderMap;
  payload: Payload;
  response: Payload;
  controllerAction: string;
  middleware: readonly string[];
  startedAt: number | null;
}

function firstHeader(headers: HeaderMap, name: string): string {
  return headers[name]?.[0] ?? '';
}

export function resolveIpAddress(request: RequestFacts): string {
  return firstHeader(request.headers, 'x-real-ip') || request.remoteAddress || 'unknown';
}

export function roundMegabytes(value: number): number {
  return Math.round(value * 10) / 10;
}

// Freezes a value and everything reachable from it
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Entries are immutable all the way down. Headers and payloads are copied
 * first, so the request's own objects are left writable.
 */
export function buildEntry(input: EntryInput, clock: Clock, memory: MemoryProbe): CaptureEntry {
  return Object.freeze({
    id: ulid(),
    recordedAt: new Date().toISOString(),
    batchId: input.batchId,
    ipAddress: resolveIpAddress(input.request),
    uri: input.request.uri,
    method: input.request.method,
    controllerAction: input.controllerAction,
    middleware: Object.freeze([...input.middleware]),
    headers: deepFreeze(structuredClone(input.headers)),
    payload: deepFreeze(structuredClone(input.payload)),
    responseStatus: input.responseStatus,
    response: deepFreeze(structuredClone(input.response)),
    duration: input.startedAt === null ? null : Math.floor(clock.now() - input.startedAt),
    memory: roundMegabytes(memory.peakMegabytes()),
  });
}
