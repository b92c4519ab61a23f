export type DeferredTask = () => void | Promise<void>;

export interface DeferredExecutor {
  schedule(task: DeferredTask): void;
  /** Cancels queued tasks and refuses new ones. Returns how many were dropped. */
  close(): number;
  readonly pending: number;
}

/**
 * Runs tasks on the check phase, after pending I/O callbacks, so a capture
 * never sits between a handler and its response bytes.
 */
export class ImmediateExecutor implements DeferredExecutor {
  private readonly handles = new Set<NodeJS.Immediate>();
  private closed = false;

  constructor(private readonly onError: (error: unknown) => void) {}

  get pending(): number {
    return this.handles.size;
  }

  schedule(task: DeferredTask): void {
    if (this.closed) {
      return;
    }

    const handle = setImmediate(() => {
      this.handles.delete(handle);
      void Promise.resolve()
        .then(task)
        .catch(this.onError);
    });
    this.handles.add(handle);
  }

  close(): number {
    this.closed = true;
    const dropped = this.handles.size;
    for (const handle of this.handles) {
      clearImmediate(handle);
    }
    this.handles.clear();
    return dropped;
  }
}
