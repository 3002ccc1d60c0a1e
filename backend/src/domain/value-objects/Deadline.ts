import { CancelledError, FeedbackError, TimeoutError } from '../errors';

/**
 * An expiry time plus an AbortSignal that fires when either the time passes
 * or the parent signal (the job's cancel signal) aborts.
 * The abort reason is always a FeedbackError: TimeoutError on expiry,
 * otherwise whatever the parent aborted with.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly onParentAbort: () => void;

  private constructor(
    readonly label: string,
    readonly timeoutMs: number,
    readonly expiresAt: number,
    private readonly parent?: AbortSignal,
  ) {
    this.timer = setTimeout(() => {
      this.controller.abort(new TimeoutError(`${label} exceeded ${timeoutMs}ms`));
    }, timeoutMs);

    this.onParentAbort = () => {
      this.controller.abort(Deadline.reasonOf(parent));
    };
    if (parent) {
      if (parent.aborted) {
        this.onParentAbort();
      } else {
        parent.addEventListener('abort', this.onParentAbort, { once: true });
      }
    }
  }

  static after(timeoutMs: number, label: string, parent?: AbortSignal): Deadline {
    return new Deadline(label, timeoutMs, Date.now() + timeoutMs, parent);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  get remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  /**
   * The FeedbackError this deadline was aborted with, or null while still live.
   */
  get reason(): FeedbackError | null {
    return this.controller.signal.aborted ? Deadline.reasonOf(this.controller.signal) : null;
  }

  throwIfExpired(): void {
    const reason = this.reason;
    if (reason) {
      throw reason;
    }
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  static reasonOf(signal: AbortSignal | undefined): FeedbackError {
    const reason: unknown = signal?.reason;
    if (reason instanceof FeedbackError) {
      return reason;
    }
    return new CancelledError();
  }
}
