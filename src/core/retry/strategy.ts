/**
 * Retry strategy.
 *
 * Immutable policy describing how many times a failed transfer is
 * retried and how long to wait in between. Delays grow exponentially up
 * to a cap, with up to 25% random jitter so clients that failed together
 * do not retry together.
 *
 * @example
 * ```typescript
 * const strategy = RetryStrategy.standard
 *
 * strategy.getDelay(0)  // ~1000ms
 * strategy.getDelay(1)  // ~2000ms
 * strategy.shouldRetry(new UpdateError('TIMEOUT', 'slow'), 0)  // true
 * ```
 */
import { isTransientError } from '../errors/classify.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Construction parameters.
 */
export interface RetryStrategyOptions {
    /** Retries after the first attempt; 0 disables retrying */
    maxAttempts: number;

    /** Delay before the first retry */
    initialDelayMs: number;

    /** Multiplier applied per retry */
    backoffFactor: number;

    /** Upper bound on any single delay */
    maxDelayMs: number;

    /** Add up to 25% random delay; defaults to true */
    enableJitter?: boolean;
}

/**
 * Named presets.
 */
export type RetryPresetName = 'disabled' | 'fast' | 'standard' | 'conservative';

/**
 * Largest share of the base delay added as jitter.
 */
const JITTER_RATIO = 0.25;

// =============================================================================
// Strategy
// =============================================================================

/**
 * Retry policy value object.
 *
 * Instances are frozen; use `with()` to derive a variant.
 */
export class RetryStrategy {

    readonly maxAttempts: number;
    readonly initialDelayMs: number;
    readonly backoffFactor: number;
    readonly maxDelayMs: number;
    readonly enableJitter: boolean;

    /** Never retry */
    static readonly disabled = new RetryStrategy({
        maxAttempts: 0,
        initialDelayMs: 0,
        backoffFactor: 1,
        maxDelayMs: 0,
    });

    /** Many quick retries, for flaky but fast networks */
    static readonly fast = new RetryStrategy({
        maxAttempts: 5,
        initialDelayMs: 500,
        backoffFactor: 1.5,
        maxDelayMs: 10_000,
    });

    /** The default */
    static readonly standard = new RetryStrategy({
        maxAttempts: 3,
        initialDelayMs: 1_000,
        backoffFactor: 2,
        maxDelayMs: 30_000,
    });

    /** Few, widely spaced retries */
    static readonly conservative = new RetryStrategy({
        maxAttempts: 2,
        initialDelayMs: 3_000,
        backoffFactor: 3,
        maxDelayMs: 120_000,
    });

    /**
     * @throws RangeError when a parameter is out of range
     */
    constructor(options: RetryStrategyOptions) {

        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 0) {

            throw new RangeError(`maxAttempts must be a non-negative integer, got ${options.maxAttempts}`);

        }

        if (!Number.isFinite(options.initialDelayMs) || options.initialDelayMs < 0) {

            throw new RangeError(`initialDelayMs must be a non-negative number, got ${options.initialDelayMs}`);

        }

        if (!Number.isFinite(options.backoffFactor) || options.backoffFactor <= 0) {

            throw new RangeError(`backoffFactor must be greater than 0, got ${options.backoffFactor}`);

        }

        if (!Number.isFinite(options.maxDelayMs) || options.maxDelayMs < 0) {

            throw new RangeError(`maxDelayMs must be a non-negative number, got ${options.maxDelayMs}`);

        }

        this.maxAttempts = options.maxAttempts;
        this.initialDelayMs = options.initialDelayMs;
        this.backoffFactor = options.backoffFactor;
        this.maxDelayMs = options.maxDelayMs;
        this.enableJitter = options.enableJitter ?? true;

        Object.freeze(this);

    }

    /**
     * Look up a preset by name.
     */
    static preset(name: RetryPresetName): RetryStrategy {

        return RetryStrategy[name];

    }

    /**
     * Delay before retry number `attempt` (0-based), in whole milliseconds.
     *
     * Without jitter this is `min(initialDelay * factor^attempt, maxDelay)`.
     * Jitter adds up to 25% on top, so the result never exceeds
     * `1.25 * maxDelay`.
     *
     * @example
     * ```typescript
     * const s = new RetryStrategy({ maxAttempts: 3, initialDelayMs: 100, backoffFactor: 2, maxDelayMs: 1000, enableJitter: false })
     * s.getDelay(0)   // 100
     * s.getDelay(3)   // 800
     * s.getDelay(10)  // 1000
     * s.getDelay(-1)  // 0
     * ```
     */
    getDelay(attempt: number): number {

        if (attempt < 0) {

            return 0;

        }

        const base = Math.min(this.initialDelayMs * this.backoffFactor ** attempt, this.maxDelayMs);

        if (!this.enableJitter || base <= 0) {

            return Math.round(base);

        }

        return Math.round(base + Math.random() * JITTER_RATIO * base);

    }

    /**
     * Whether the retry budget allows retry number `attempt` (0-based).
     */
    canRetry(attempt: number): boolean {

        return attempt < this.maxAttempts;

    }

    /**
     * Whether a failure should be retried.
     *
     * The budget is checked first; then only transient failures (network,
     * timeout, 5xx) qualify.
     *
     * @example
     * ```typescript
     * strategy.shouldRetry(new UpdateError('NETWORK_ERROR', 'reset'), 0)  // true
     * strategy.shouldRetry(new UpdateError('PARSE_ERROR', 'bad'), 0)     // false
     * strategy.shouldRetry(new UpdateError('NETWORK_ERROR', 'reset'), 3) // false (budget)
     * ```
     */
    shouldRetry(error: unknown, attempt: number): boolean {

        if (!this.canRetry(attempt)) {

            return false;

        }

        return isTransientError(error);

    }

    /**
     * Derive a strategy with some parameters replaced.
     */
    with(overrides: Partial<RetryStrategyOptions>): RetryStrategy {

        return new RetryStrategy({
            maxAttempts: overrides.maxAttempts ?? this.maxAttempts,
            initialDelayMs: overrides.initialDelayMs ?? this.initialDelayMs,
            backoffFactor: overrides.backoffFactor ?? this.backoffFactor,
            maxDelayMs: overrides.maxDelayMs ?? this.maxDelayMs,
            enableJitter: overrides.enableJitter ?? this.enableJitter,
        });

    }

    /**
     * Value equality.
     */
    equals(other: RetryStrategy): boolean {

        return this.hashKey() === other.hashKey();

    }

    /**
     * Stable key; equal strategies produce equal keys.
     */
    hashKey(): string {

        return [
            this.maxAttempts,
            this.initialDelayMs,
            this.backoffFactor,
            this.maxDelayMs,
            this.enableJitter ? 1 : 0,
        ].join(':');

    }

    toString(): string {

        return `RetryStrategy(maxAttempts: ${this.maxAttempts}, initialDelay: ${this.initialDelayMs}ms, `
            + `backoff: ${this.backoffFactor}x, maxDelay: ${this.maxDelayMs}ms, `
            + `jitter: ${this.enableJitter ? 'on' : 'off'})`;

    }

}

/**
 * Preset lookup table.
 */
export const RETRY_PRESETS: Readonly<Record<RetryPresetName, RetryStrategy>> = Object.freeze({
    disabled: RetryStrategy.disabled,
    fast: RetryStrategy.fast,
    standard: RetryStrategy.standard,
    conservative: RetryStrategy.conservative,
});
