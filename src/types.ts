// Type definitions shared across the capture pipeline

export type Structured = Record<string, unknown> | unknown[];

/** A captured body: decoded JSON, raw text, or one of the sentinel strings. */
export type Payload = Structured | string;

export type HeaderMap = Record<string, string[]>;

export type TransportKind = 'http' | 'json-rpc' | 'json-rpc-http' | 'grpc';

export type CaptureChannel = 'request' | 'service';

export interface HandlerDescriptor {
  action: string;
  transport: TransportKind;
}

export interface RpcContext {
  get(key: string): unknown;
}

export interface RequestFacts {
  method: string;
  uri: string;
  path: string;
  headers: HeaderMap;
  query: unknown;
  body: unknown;
  remoteAddress?: string;
}

export interface ResponseFacts {
  statusCode: number;
  contentType: string;
  /** `null` when the body was a stream and could not be read. */
  body: string | null;
}

export interface CaptureFacts {
  batchId: string;
  request: RequestFacts;
  response: ResponseFacts;
  handler: HandlerDescriptor;
  middleware: readonly string[];
  startedAt: number | null;
  rpc?: RpcContext;
}

export interface CaptureEntry {
  readonly id: string;
  readonly recordedAt: string;
  readonly batchId: string;
  readonly ipAddress: string;
  readonly uri: string;
  readonly method: string;
  readonly controllerAction: string;
  readonly middleware: readonly string[];
  readonly headers: Readonly<Record<string, readonly string[]>>;
  readonly payload: Payload;
  readonly responseStatus: number;
  readonly response: Payload;
  readonly duration: number | null;
  readonly memory: number;
}

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
}

export interface MemoryProbe {
  /** Peak resident set size in megabytes. */
  peakMegabytes(): number;
}
