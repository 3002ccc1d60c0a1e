import { FeedbackError, FeedbackErrorKind } from '../errors';

export interface RetryPolicyProps {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** 0 disables jitter; 0.2 spreads each delay over ±20%. */
  jitterRatio: number;
  retryableKinds: readonly FeedbackErrorKind[];
}

/**
 * Value Object describing how many times, and how far apart, an operation is retried
 */
export class RetryPolicy {
  private readonly props: Readonly<RetryPolicyProps>;

  private constructor(props: RetryPolicyProps) {
    this.props = Object.freeze({ ...props, retryableKinds: [...props.retryableKinds] });
  }

  static create(props: RetryPolicyProps): RetryPolicy {
    if (!Number.isInteger(props.maxAttempts) || props.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${props.maxAttempts}`);
    }
    if (props.baseDelayMs < 0 || props.maxDelayMs < 0) {
      throw new Error('Retry delays cannot be negative');
    }
    if (props.maxDelayMs < props.baseDelayMs) {
      throw new Error(`maxDelayMs (${props.maxDelayMs}) must be >= baseDelayMs (${props.baseDelayMs})`);
    }
    if (props.multiplier < 1) {
      throw new Error(`multiplier must be >= 1, got ${props.multiplier}`);
    }
    if (props.jitterRatio < 0 || props.jitterRatio > 1) {
      throw new Error(`jitterRatio must be between 0 and 1, got ${props.jitterRatio}`);
    }
    return new RetryPolicy(props);
  }

  get maxAttempts(): number {
    return this.props.maxAttempts;
  }

  get baseDelayMs(): number {
    return this.props.baseDelayMs;
  }

  get maxDelayMs(): number {
    return this.props.maxDelayMs;
  }

  get multiplier(): number {
    return this.props.multiplier;
  }

  get jitterRatio(): number {
    return this.props.jitterRatio;
  }

  get retryableKinds(): readonly FeedbackErrorKind[] {
    return this.props.retryableKinds;
  }

  /**
   * Whether a failure on attempt `attempt` (1-based) earns another attempt.
   */
  shouldRetry(error: FeedbackError, attempt: number): boolean {
    return error.retryable && this.props.retryableKinds.includes(error.kind) && attempt < this.props.maxAttempts;
  }

  /**
   * Delay to wait after failed attempt `attempt` (1-based):
   * min(maxDelay, base * multiplier^(attempt-1)), then jittered.
   */
  delayForAttempt(attempt: number, random: () => number = Math.random): number {
    const exponent = Math.max(0, attempt - 1);
    const raw = Math.min(this.props.maxDelayMs, this.props.baseDelayMs * Math.pow(this.props.multiplier, exponent));
    if (this.props.jitterRatio === 0) {
      return Math.round(raw);
    }
    const spread = raw * this.props.jitterRatio;
    const jittered = raw - spread + random() * spread * 2;
    return Math.round(Math.min(this.props.maxDelayMs, Math.max(0, jittered)));
  }
}
