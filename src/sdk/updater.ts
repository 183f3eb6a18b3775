/**
 * Updater - the assembled update client.
 *
 * Owns the observer, logger, pooled transport, controller and scheduler
 * built by `createUpdater()`, and releases them together on `close()`.
 */
import type { UpdaterConfig } from '../core/config/index.js';
import type { UpdateController, UpdateScheduler } from '../core/controller/index.js';
import type { Logger } from '../core/logger/index.js';
import type { UpdaterObserver } from '../core/observer.js';
import type { HttpTransport } from '../core/transport/index.js';

export interface UpdaterParts {
    config: UpdaterConfig;
    observer: UpdaterObserver;
    logger: Logger;
    transport: HttpTransport;
    controller: UpdateController;
    scheduler: UpdateScheduler;
}

export class Updater {

    readonly config: UpdaterConfig;
    readonly observer: UpdaterObserver;
    readonly logger: Logger;
    readonly transport: HttpTransport;
    readonly controller: UpdateController;
    readonly scheduler: UpdateScheduler;

    #closed = false;

    constructor(parts: UpdaterParts) {

        this.config = parts.config;
        this.observer = parts.observer;
        this.logger = parts.logger;
        this.transport = parts.transport;
        this.controller = parts.controller;
        this.scheduler = parts.scheduler;

    }

    get isClosed(): boolean {

        return this.#closed;

    }

    /**
     * Stop scheduling, cancel any active download, close the connection
     * pool and flush the logger. Safe to call twice.
     */
    async close(): Promise<void> {

        if (this.#closed) {

            return;

        }

        this.#closed = true;

        this.scheduler.stop();

        await this.controller.dispose();
        await this.transport.close();
        await this.logger.stop();

    }

}
