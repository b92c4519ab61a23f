import { defineCaptureConfig, CaptureConfigInput } from '../config';
import type { DeferredExecutor, DeferredTask } from '../scheduler';
import type { CaptureFacts, Clock, MemoryProbe } from '../types';

export class ManualExecutor implements DeferredExecutor {
  readonly tasks: DeferredTask[] = [];
  closed = false;

  get pending(): number {
    return this.tasks.length;
  }

  schedule(task: DeferredTask): void {
    if (!this.closed) {
      this.tasks.push(task);
    }
  }

  close(): number {
    this.closed = true;
    return this.tasks.splice(0).length;
  }

  async runAll(): Promise<void> {
    for (const task of this.tasks.splice(0)) {
      await task();
    }
  }
}

export const fixedClock = (now: number): Clock => ({ now: () => now });

// Returns each reading in turn, then keeps returning the last one
export const steppingClock = (...readings: number[]): Clock => {
  let index = 0;
  return {
    now: () => readings[Math.min(index++, readings.length - 1)],
  };
};

export const fixedMemory = (megabytes: number): MemoryProbe => ({ peakMegabytes: () => megabytes });

export const makeConfig = (input: CaptureConfigInput = {}) => defineCaptureConfig(input);

export const makeFacts = (overrides: Partial<CaptureFacts> = {}): CaptureFacts => ({
  batchId: 'batch-1',
  request: {
    method: 'POST',
    uri: '/users?page=2',
    path: '/users',
    headers: {
      'content-type': ['application/json'],
      authorization: ['Bearer test-secret'],
    },
    query: { page: '2' },
    body: { name: 'bob', password: 'test-password' },
    remoteAddress: '10.0.0.5',
  },
  response: {
    statusCode: 200,
    contentType: 'application/json',
    body: '{"token":"secret","user":"bob"}',
  },
  handler: { action: 'UserController@store', transport: 'http' },
  middleware: ['auth'],
  startedAt: 1000,
  ...overrides,
});
