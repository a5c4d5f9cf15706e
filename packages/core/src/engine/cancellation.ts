// packages/core/src/engine/cancellation.ts — Cooperative cancellation for scans and fixes

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;

  /** Token that cancels when `signal` aborts. */
  static fromSignal(signal: AbortSignal): CancellationToken {
    const token = new CancellationToken();
    if (signal.aborted) {
      token.cancel('aborted');
    } else {
      signal.addEventListener('abort', () => token.cancel('aborted'), { once: true });
    }
    return token;
  }

  /** Signal cancellation. Later calls keep the first reason. */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Throw if already cancelled. Scanners call this between units of work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(this.cancelReason ? `Operation was cancelled: ${this.cancelReason}` : 'Operation was cancelled');
    }
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
