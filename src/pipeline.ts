import type { CaptureConfig } from './config';
import { channelFor, shouldCapture } from './decision';
import { buildEntry, processMemory, systemClock } from './entry';
import { extractRequestPayload, extractResponsePayload, PURGED } from './extract';
import type { CaptureMetrics } from './health';
import { logger as defaultLogger, Logger } from './log';
import type { Recorder } from './recorder';
import { hideParameters, isStructured, redactHeaders } from './redact';
import { GRPC_REQUEST_KEY, GRPC_RESPONSE_KEY } from './resolver';
import type { DeferredExecutor } from './scheduler';
import type { CaptureChannel, CaptureEntry, CaptureFacts, Clock, MemoryProbe, Payload } from './types';

export interface PipelineDependencies {
  config: CaptureConfig;
  recorder: Recorder;
  executor: DeferredExecutor;
  clock?: Clock;
  memory?: MemoryProbe;
  metrics?: CaptureMetrics;
  logger?: Logger;
}

export class CapturePipeline {
  readonly config: CaptureConfig;
  /** Shared with the hooks so start times and durations come from one source. */
  readonly clock: Clock;
  private readonly recorder: Recorder;
  private readonly executor: DeferredExecutor;
  private readonly memory: MemoryProbe;
  private readonly metrics?: CaptureMetrics;
  private readonly log: Logger;

  constructor(deps: PipelineDependencies) {
    this.config = deps.config;
    this.recorder = deps.recorder;
    this.executor = deps.executor;
    this.clock = deps.clock ?? systemClock;
    this.memory = deps.memory ?? processMemory;
    this.metrics = deps.metrics;
    this.log = deps.logger ?? defaultLogger;
  }

  /**
   * Queues the capture; returns before any extraction work happens.
   */
  handle(facts: CaptureFacts): void {
    this.executor.schedule(() => {
      this.process(facts);
    });
  }

  get pending(): number {
    return this.executor.pending;
  }

  /**
   * Drops queued captures. Telemetry is best-effort, so nothing is flushed.
   */
  close(): number {
    return this.executor.close();
  }

  /**
   * Runs the capture synchronously. Returns the dispatched entry, or null
   * when the request was not captured.
   */
  process(facts: CaptureFacts): CaptureEntry | null {
    try {
      return this.capture(facts);
    } catch (error) {
      this.metrics?.recordFailed();
      this.log.warn({ error, batchId: facts.batchId, uri: facts.request.uri }, 'Capture failed');
      return null;
    }
  }

  private capture(facts: CaptureFacts): CaptureEntry | null {
    const { config } = this;

    if (!shouldCapture(config, { kind: 'request', path: facts.request.path })) {
      this.metrics?.recordSkipped();
      return null;
    }

    let payload = extractRequestPayload(facts.request, facts.handler.transport, {
      sizeLimitKb: config.sizeLimitKb,
      sizeMeasure: config.sizeMeasure,
      outOfBand: () => facts.rpc?.get(GRPC_REQUEST_KEY),
    });
    if (payload === PURGED) {
      this.metrics?.recordPurged();
    } else if (isStructured(payload)) {
      payload = hideParameters(payload, config.hiddenRequestParameters);
    }

    const response = this.responsePayload(facts);

    const entry = buildEntry(
      {
        batchId: facts.batchId,
        request: facts.request,
        responseStatus: facts.response.statusCode,
        headers: redactHeaders(facts.request.headers, config.hiddenRequestHeaders),
        payload,
        response,
        controllerAction: facts.handler.action,
        middleware: facts.middleware,
        startedAt: facts.startedAt,
      },
      this.clock,
      this.memory
    );

    this.dispatch(entry, channelFor(facts.handler));
    return entry;
  }

  private responsePayload(facts: CaptureFacts): Payload {
    const { config } = this;
    const extracted = extractResponsePayload(facts.response.body, facts.response.contentType, {
      sizeLimitKb: config.sizeLimitKb,
      sizeMeasure: config.sizeMeasure,
      outOfBand: () => facts.rpc?.get(GRPC_RESPONSE_KEY),
    });

    if (extracted === PURGED) {
      this.metrics?.recordPurged();
    }

    return isStructured(extracted) ? hideParameters(extracted, config.hiddenResponseParameters) : extracted;
  }

  private dispatch(entry: CaptureEntry, channel: CaptureChannel): void {
    const result = channel === 'service' ? this.recorder.recordService(entry) : this.recorder.recordRequest(entry);
    this.metrics?.recordCaptured(channel, entry.method, entry.responseStatus);
    this.log.debug({ batchId: entry.batchId, channel, uri: entry.uri }, 'Entry recorded');

    void Promise.resolve(result).catch((error: unknown) => {
      this.log.warn({ error, batchId: entry.batchId, channel }, 'Recorder rejected entry');
    });
  }
}
