import { describe, it, expect, vi } from 'vitest';
import { buildEntry } from '../entry';
import { logger } from '../log';
import { LogRecorder, MemoryRecorder } from '../recorder';
import type { CaptureEntry } from '../types';
import { fixedClock, fixedMemory, makeFacts } from './helpers';

const makeEntry = (batchId: string): CaptureEntry => {
  const facts = makeFacts();
  return buildEntry(
    {
      batchId,
      request: facts.request,
      responseStatus: 200,
      headers: {},
      payload: {},
      response: 'Empty Response',
      controllerAction: '',
      middleware: [],
      startedAt: null,
    },
    fixedClock(0),
    fixedMemory(1)
  );
};

describe('MemoryRecorder', () => {
  it('keeps the newest entries first and trims to capacity', () => {
    const recorder = new MemoryRecorder(2);
    const first = makeEntry('one');
    const second = makeEntry('two');
    const third = makeEntry('three');

    recorder.recordRequest(first);
    recorder.recordService(second);
    recorder.recordRequest(third);

    expect(recorder.list()).toEqual([third, second]);
    expect(recorder.list('service')).toEqual([second]);
  });

  it('finds entries by batch id', () => {
    const recorder = new MemoryRecorder();
    const http = makeEntry('shared');
    const rpc = makeEntry('shared');
    recorder.recordRequest(http);
    recorder.recordService(rpc);
    recorder.recordRequest(makeEntry('other'));

    expect(recorder.byBatch('shared')).toEqual([rpc, http]);
  });
});

describe('LogRecorder', () => {
  it('logs each entry with its channel', () => {
    const info = vi.spyOn(logger, 'info');
    const recorder = new LogRecorder(logger);
    const entry = makeEntry('batch-9');

    recorder.recordRequest(entry);
    recorder.recordService(entry);

    expect(info).toHaveBeenNthCalledWith(1, { channel: 'request', entry }, 'captured request');
    expect(info).toHaveBeenNthCalledWith(2, { channel: 'service', entry }, 'captured service call');
    info.mockRestore();
  });
});
