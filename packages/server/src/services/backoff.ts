const MULTIPLIER = 1.6;
const JITTER = 0.4;

export interface BackoffOptions {
  initialMs: number;
  /** Ceiling as a multiple of `initialMs`. */
  maxFactor: number;
  /** Uniform source in [0, 1); defaults to Math.random. */
  random?: () => number;
}

/**
 * Exponential backoff with jitter. Each call to {@link next} counts as one
 * consecutive failure; the returned delay never exceeds
 * `initialMs * maxFactor`.
 */
export class Backoff {
  private readonly initialMs: number;
  private readonly maxMs: number;
  private readonly random: () => number;
  private currentMs: number;
  private failures = 0;

  constructor(options: BackoffOptions) {
    this.initialMs = options.initialMs;
    this.maxMs = options.initialMs * options.maxFactor;
    this.random = options.random ?? Math.random;
    this.currentMs = options.initialMs;
  }

  get maxDelayMs(): number {
    return this.maxMs;
  }

  next(): number {
    this.currentMs =
      this.failures === 0
        ? this.initialMs
        : Math.min(this.currentMs * MULTIPLIER, this.maxMs);
    this.failures += 1;

    const spread = JITTER * this.currentMs;
    const jittered = this.currentMs + (this.random() * 2 - 1) * spread;
    return Math.min(Math.round(jittered), this.maxMs);
  }
}
