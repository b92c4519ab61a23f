import { describe, it, expect } from 'vitest';
import { defineCaptureConfig, loadCaptureConfig } from '../config';
import { parseEnv, splitList } from '../env';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.CAPTURE_SIZE_LIMIT_KB).toBe(64);
    expect(env.CAPTURE_SIZE_MEASURE).toBe('characters');
    expect(env.CAPTURE_BATCH_HEADER).toBe('batch-id');
  });

  it('reports every invalid variable', () => {
    expect(() => parseEnv({ CAPTURE_SIZE_LIMIT_KB: '-1', CAPTURE_SIZE_MEASURE: 'words' })).toThrow(
      "Environment validation failed: CAPTURE_SIZE_LIMIT_KB: Number must be greater than or equal to 0, CAPTURE_SIZE_MEASURE: Invalid enum value. Expected 'characters' | 'bytes', received 'words'"
    );
  });
});

describe('splitList', () => {
  it('trims entries and drops blanks', () => {
    expect(splitList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
    expect(splitList('')).toEqual([]);
  });
});

describe('loadCaptureConfig', () => {
  it('maps environment variables onto the config', () => {
    const config = loadCaptureConfig(
      parseEnv({
        CAPTURE_ENABLED: 'request,exception',
        CAPTURE_SIZE_LIMIT_KB: '16',
        CAPTURE_SIZE_MEASURE: 'bytes',
        CAPTURE_HIDDEN_RESPONSE_FIELDS: 'token, data.secret',
        CAPTURE_HIDDEN_HEADERS: 'Authorization',
        CAPTURE_ONLY_PATHS: 'internal/audit',
      })
    );

    expect([...config.enabled]).toEqual(['request', 'exception']);
    expect(config.sizeLimitKb).toBe(16);
    expect(config.sizeMeasure).toBe('bytes');
    expect(config.hiddenResponseParameters).toEqual(['token', 'data.secret']);
    expect(config.hiddenRequestParameters).toEqual(['password', 'password_confirmation']);
    expect(config.hiddenRequestHeaders).toEqual(['authorization']);
    expect(config.ignorePaths).toEqual(['healthz', 'readyz', 'metrics']);
    expect(config.onlyPaths).toEqual(['internal/audit']);
  });
});

describe('defineCaptureConfig', () => {
  it('returns a frozen snapshot with defaults', () => {
    const config = defineCaptureConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.hiddenResponseParameters)).toBe(true);
    expect(config.enabled.has('request')).toBe(true);
    expect(config.sizeLimitKb).toBe(64);
    expect(config.batchHeader).toBe('batch-id');
  });
});
