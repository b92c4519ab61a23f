export { registerCaptureHooks, trackMiddleware, collectFacts, normalizeHeaders } from './capture';
export type { CaptureContext, CaptureHookOptions } from './capture';
export { defineCaptureConfig, loadCaptureConfig, DEFAULT_SIZE_LIMIT_KB } from './config';
export type { CaptureConfig, CaptureConfigInput, SizeMeasure } from './config';
export { shouldCapture, channelFor, matchesPathRule, isEnabled } from './decision';
export { buildEntry, resolveIpAddress, systemClock, processMemory } from './entry';
export { getEnv, parseEnv } from './env';
export type { Env } from './env';
export {
  extractResponsePayload,
  extractRequestPayload,
  contentWithinLimits,
  EMPTY_RESPONSE,
  HTML_RESPONSE,
  PURGED,
} from './extract';
export { CaptureMetrics, registerHealthRoutes } from './health';
export { logger } from './log';
export { CapturePipeline } from './pipeline';
export type { PipelineDependencies } from './pipeline';
export { LogRecorder, MemoryRecorder } from './recorder';
export type { Recorder } from './recorder';
export { hideParameters, redactHeaders, MASK } from './redact';
export {
  routeResolver,
  resolveBatchId,
  MapRpcContext,
  CARRIER_KEY,
  GRPC_REQUEST_KEY,
  GRPC_RESPONSE_KEY,
} from './resolver';
export type { HandlerResolver, RpcContextProvider } from './resolver';
export { ImmediateExecutor } from './scheduler';
export type { DeferredExecutor, DeferredTask } from './scheduler';
export type * from './types';
