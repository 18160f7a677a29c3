export const DEFAULT_DELETE_GRACE_MS = 5000;

interface PendingDeletion {
  readonly timer: NodeJS.Timeout;
  readonly settle: (elapsed: boolean) => void;
}

/**
 * Cancellable grace window before a ticket channel is removed.
 * Only a UX debounce; correctness never depends on it.
 */
export class DeletionCountdown {
  private readonly pending = new Map<string, PendingDeletion>();

  constructor(public readonly delayMs: number = DEFAULT_DELETE_GRACE_MS) {}

  /**
   * Resolves true once the window elapsed, false if it was cancelled
   */
  wait(ticketId: string): Promise<boolean> {
    if (this.pending.has(ticketId)) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>(resolve => {
      const settle = (elapsed: boolean): void => {
        this.pending.delete(ticketId);
        resolve(elapsed);
      };
      const timer = setTimeout(() => settle(true), this.delayMs);
      this.pending.set(ticketId, { timer, settle });
    });
  }

  /**
   * Returns false when no countdown was running for the ticket
   */
  cancel(ticketId: string): boolean {
    const entry = this.pending.get(ticketId);
    if (!entry) return false;

    clearTimeout(entry.timer);
    entry.settle(false);
    return true;
  }

  /**
   * Cancel every running countdown (shutdown)
   */
  cancelAll(): number {
    const ids = [...this.pending.keys()];
    ids.forEach(id => this.cancel(id));
    return ids.length;
  }
}
