// packages/core/src/engine/cancellation.ts — Cancellation for in-progress waits

export class CancellationToken {
  private cancelled = false;
  private reason = 'Operation was cancelled';
  private callbacks = new Set<() => void>();
  private controller: AbortController | undefined;

  /** Signal cancellation. Idempotent; only the first reason is kept. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    if (reason) this.reason = reason;
    this.controller?.abort(new CancellationError(this.reason));
    for (const cb of this.callbacks) {
      try {
        cb();
      } catch {
        // a failing listener must not stop the others from running
      }
    }
    this.callbacks.clear();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * AbortSignal tied to this token, for handing to HTTP requests.
   * Created lazily; already aborted if the token was cancelled first.
   */
  get signal(): AbortSignal {
    if (!this.controller) {
      this.controller = new AbortController();
      if (this.cancelled) {
        this.controller.abort(new CancellationError(this.reason));
      }
    }
    return this.controller.signal;
  }

  /** Throw if already cancelled. Call before each poll. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.reason);
    }
  }

  /**
   * Register a callback to run on cancellation.
   * If already cancelled, the callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Resolve after `ms`, or early when cancelled.
   * Returns true if the full delay elapsed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      let timer: ReturnType<typeof setTimeout> | undefined;
      const onCancelHandler = () => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(false);
      };

      timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, Math.max(0, ms));

      this.onCancel(onCancelHandler);
    });
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
