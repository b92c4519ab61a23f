import { Env, splitList } from './env';

export type SizeMeasure = 'characters' | 'bytes';

export interface CaptureConfig {
  readonly enabled: ReadonlySet<string>;
  readonly sizeLimitKb: number;
  readonly sizeMeasure: SizeMeasure;
  readonly hiddenResponseParameters: readonly string[];
  readonly hiddenRequestParameters: readonly string[];
  readonly hiddenRequestHeaders: readonly string[];
  readonly ignorePaths: readonly string[];
  readonly onlyPaths: readonly string[];
  readonly batchHeader: string;
}

export interface CaptureConfigInput {
  enabled?: Iterable<string>;
  sizeLimitKb?: number;
  sizeMeasure?: SizeMeasure;
  hiddenResponseParameters?: readonly string[];
  hiddenRequestParameters?: readonly string[];
  hiddenRequestHeaders?: readonly string[];
  ignorePaths?: readonly string[];
  onlyPaths?: readonly string[];
  batchHeader?: string;
}

export const DEFAULT_SIZE_LIMIT_KB = 64;

/**
 * Builds a frozen config snapshot. Hooks read it on every request, so it is
 * never mutated after construction.
 */
export function defineCaptureConfig(input: CaptureConfigInput = {}): CaptureConfig {
  return Object.freeze({
    enabled: new Set(input.enabled ?? ['request']),
    sizeLimitKb: input.sizeLimitKb ?? DEFAULT_SIZE_LIMIT_KB,
    sizeMeasure: input.sizeMeasure ?? 'characters',
    hiddenResponseParameters: Object.freeze([...(input.hiddenResponseParameters ?? [])]),
    hiddenRequestParameters: Object.freeze([
      ...(input.hiddenRequestParameters ?? ['password', 'password_confirmation']),
    ]),
    hiddenRequestHeaders: Object.freeze(
      (input.hiddenRequestHeaders ?? ['authorization', 'cookie', 'x-api-key']).map((h) => h.toLowerCase())
    ),
    ignorePaths: Object.freeze([...(input.ignorePaths ?? [])]),
    onlyPaths: Object.freeze([...(input.onlyPaths ?? [])]),
    batchHeader: (input.batchHeader ?? 'batch-id').toLowerCase(),
  });
}

export function loadCaptureConfig(env: Env): CaptureConfig {
  return defineCaptureConfig({
    enabled: splitList(env.CAPTURE_ENABLED),
    sizeLimitKb: env.CAPTURE_SIZE_LIMIT_KB,
    sizeMeasure: env.CAPTURE_SIZE_MEASURE,
    hiddenResponseParameters: splitList(env.CAPTURE_HIDDEN_RESPONSE_FIELDS),
    hiddenRequestParameters: splitList(env.CAPTURE_HIDDEN_REQUEST_FIELDS),
    hiddenRequestHeaders: splitList(env.CAPTURE_HIDDEN_HEADERS),
    ignorePaths: splitList(env.CAPTURE_IGNORE_PATHS),
    onlyPaths: splitList(env.CAPTURE_ONLY_PATHS),
    batchHeader: env.CAPTURE_BATCH_HEADER,
  });
}
