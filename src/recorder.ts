import type { Logger } from './log';
import type { CaptureChannel, CaptureEntry } from './types';

/**
 * Sink for finished entries. Implementations may be async; the pipeline
 * never awaits them on the response path.
 */
export interface Recorder {
  recordRequest(entry: CaptureEntry): void | Promise<void>;
  recordService(entry: CaptureEntry): void | Promise<void>;
}

export class LogRecorder implements Recorder {
  constructor(private readonly log: Logger) {}

  recordRequest(entry: CaptureEntry): void {
    this.log.info({ channel: 'request', entry }, 'captured request');
  }

  recordService(entry: CaptureEntry): void {
    this.log.info({ channel: 'service', entry }, 'captured service call');
  }
}

interface StoredEntry {
  channel: CaptureChannel;
  entry: CaptureEntry;
}

/**
 * Keeps the most recent entries in memory, newest first.
 */
export class MemoryRecorder implements Recorder {
  private readonly entries: StoredEntry[] = [];

  constructor(private readonly maxEntries = 500) {}

  recordRequest(entry: CaptureEntry): void {
    this.add('request', entry);
  }

  recordService(entry: CaptureEntry): void {
    this.add('service', entry);
  }

  list(channel?: CaptureChannel): CaptureEntry[] {
    return this.entries
      .filter((stored) => channel === undefined || stored.channel === channel)
      .map((stored) => stored.entry);
  }

  byBatch(batchId: string): CaptureEntry[] {
    return this.list().filter((entry) => entry.batchId === batchId);
  }

  private add(channel: CaptureChannel, entry: CaptureEntry): void {
    this.entries.unshift({ channel, entry });
    if (this.entries.length > this.maxEntries) {
      this.entries.length = this.maxEntries;
    }
  }
}
