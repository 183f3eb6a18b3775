/**
 * Periodic update checks.
 *
 * Runs `controller.checkForUpdate()` on an interval, skipping ticks that
 * fall inside the cooldown window or while the controller is busy.
 * Disabled unless `intervalMs` is positive.
 *
 * @example
 * ```typescript
 * const scheduler = new UpdateScheduler(controller, { intervalMs: 6 * 60 * 60 * 1000 })
 *
 * scheduler.start()
 * // later
 * scheduler.stop()
 * ```
 */
import type { UpdaterObserver } from '../observer.js';
import type { UpdateDescriptor } from '../update/types.js';
import type { UpdateController } from './controller.js';
import type { Result } from './types.js';

export interface UpdateSchedulerOptions {
    /** Interval between checks; 0 disables scheduling */
    intervalMs?: number;

    /** Minimum time between two checks unless forced */
    cooldownMs?: number;

    clock?: () => number;

    observer?: UpdaterObserver;
}

export interface StartOptions {
    /** Run a check immediately; defaults to true */
    checkOnStart?: boolean;
}

export interface ScheduledCheckOptions {
    /** Ignore the cooldown */
    force?: boolean;
}

export const DEFAULT_COOLDOWN_MS = 60 * 60 * 1000;

const BUSY_STATUSES = new Set(['checking', 'downloading', 'paused']);

export class UpdateScheduler {

    #controller: UpdateController;
    #intervalMs: number;
    #cooldownMs: number;
    #clock: () => number;
    #observer: UpdaterObserver;

    #timer: NodeJS.Timeout | null = null;
    #inflight: Promise<Result<UpdateDescriptor | null>> | null = null;
    #lastCheckTime: number | null = null;
    #checks = 0;

    constructor(controller: UpdateController, options: UpdateSchedulerOptions = {}) {

        this.#controller = controller;
        this.#intervalMs = Math.max(0, options.intervalMs ?? 0);
        this.#cooldownMs = Math.max(0, options.cooldownMs ?? DEFAULT_COOLDOWN_MS);
        this.#clock = options.clock ?? Date.now;
        this.#observer = options.observer ?? controller.observer;

    }

    get isRunning(): boolean {

        return this.#timer !== null;

    }

    get isEnabled(): boolean {

        return this.#intervalMs > 0;

    }

    /**
     * Clock time of the last check that actually ran.
     */
    get lastCheckTime(): number | null {

        return this.#lastCheckTime;

    }

    get checks(): number {

        return this.#checks;

    }

    /**
     * Start the interval. Does nothing when disabled or already running.
     */
    start(options: StartOptions = {}): void {

        if (!this.isEnabled || this.#timer) {

            return;

        }

        const checkOnStart = options.checkOnStart ?? true;

        this.#timer = setInterval(() => {

            this.#tick();

        }, this.#intervalMs);

        this.#timer.unref();

        this.#observer.emit('scheduler:started', { intervalMs: this.#intervalMs, checkOnStart });

        if (checkOnStart) {

            this.#tick();

        }

    }

    stop(): void {

        if (!this.#timer) {

            return;

        }

        clearInterval(this.#timer);
        this.#timer = null;

        this.#observer.emit('scheduler:stopped', { checks: this.#checks });

    }

    /**
     * Run one check, honoring the cooldown unless forced.
     *
     * A skipped check resolves with the controller's current descriptor.
     */
    async check(options: ScheduledCheckOptions = {}): Promise<Result<UpdateDescriptor | null>> {

        if (this.#inflight) {

            return this.#inflight;

        }

        const now = this.#clock();

        if (!options.force && this.#lastCheckTime !== null) {

            const elapsed = now - this.#lastCheckTime;

            if (elapsed < this.#cooldownMs) {

                this.#observer.emit('scheduler:skipped', {
                    reason: 'cooldown',
                    nextCheckInMs: this.#cooldownMs - elapsed,
                });

                return [this.#controller.descriptor, null];

            }

        }

        if (BUSY_STATUSES.has(this.#controller.status)) {

            this.#observer.emit('scheduler:skipped', { reason: 'busy', nextCheckInMs: this.#intervalMs });

            return [this.#controller.descriptor, null];

        }

        this.#lastCheckTime = now;
        this.#checks++;

        const inflight = this.#controller.checkForUpdate();

        this.#inflight = inflight;

        const result = await inflight;

        this.#inflight = null;

        return result;

    }

    /**
     * Wait for a check started by the interval.
     */
    async whenIdle(): Promise<void> {

        if (this.#inflight) {

            await this.#inflight;

        }

    }

    #tick(): void {

        // Failures land on controller.error and the check:failed event
        void this.check();

    }

}
