/**
 * One-shot cooperative cancellation flag shared by the runner and its workers.
 * A fresh token is created for every batch; there is no reset.
 */
export class CancellationToken {
  private readonly controller = new AbortController();

  private readonly signaled: Promise<void>;

  constructor() {
    this.signaled = new Promise<void>((resolve) => {
      this.controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  signal(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  isSignaled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Resolves once `signal()` has been called; already resolved for a signaled token.
   */
  whenSignaled(): Promise<void> {
    return this.signaled;
  }

  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }
}
