/**
 * Transfer speed over a sliding window.
 *
 * Each chunk is recorded with its arrival time. Samples older than the
 * window are dropped, and speed is the bytes still in the window divided
 * by the time they span.
 *
 * @example
 * ```typescript
 * const meter = new SpeedMeter(3000)
 *
 * meter.record(64 * 1024)
 * meter.record(64 * 1024)
 * meter.bytesPerSecond   // undefined until samples span some time
 * ```
 */
import { DEFAULT_DOWNLOAD_OPTIONS } from './types.js';

interface Sample {
    at: number;
    bytes: number;
}

export class SpeedMeter {

    #windowMs: number;
    #clock: () => number;
    #samples: Sample[] = [];
    #speed: number | undefined;

    constructor(
        windowMs: number = DEFAULT_DOWNLOAD_OPTIONS.speedWindowMs,
        clock: () => number = Date.now,
    ) {

        this.#windowMs = windowMs;
        this.#clock = clock;

    }

    /**
     * Speed after the last `record()`, in whole bytes per second.
     *
     * Undefined until the window spans more than 0ms.
     */
    get bytesPerSecond(): number | undefined {

        return this.#speed;

    }

    /**
     * Record a chunk and recompute the speed.
     */
    record(bytes: number): number | undefined {

        const now = this.#clock();

        this.#samples.push({ at: now, bytes });

        while (this.#samples.length > 0 && now - (this.#samples[0]?.at ?? now) > this.#windowMs) {

            this.#samples.shift();

        }

        const first = this.#samples[0];
        const span = first ? now - first.at : 0;

        if (span <= 0) {

            this.#speed = undefined;

            return undefined;

        }

        const total = this.#samples.reduce((sum, sample) => sum + sample.bytes, 0);

        this.#speed = Math.round(total * 1000 / span);

        return this.#speed;

    }

    /**
     * Forget all samples (after a pause or a retry).
     */
    reset(): void {

        this.#samples = [];
        this.#speed = undefined;

    }

}

/**
 * Seconds left at the given speed.
 *
 * Undefined when the total is unknown, already reached, or the speed
 * is not positive.
 */
export function estimateEta(total: number, downloaded: number, speed: number | undefined): number | undefined {

    if (speed === undefined || speed <= 0 || total <= downloaded) {

        return undefined;

    }

    return Math.round((total - downloaded) / speed);

}
