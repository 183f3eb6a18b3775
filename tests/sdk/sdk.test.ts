import { describe, it, expect } from 'vitest';

import {
    RetryStrategy,
    UpdateError,
    buildRetryStrategy,
    createUpdater,
} from '../../src/sdk/index.js';
import { FakeFetch, jsonResponse } from '../utils/fake-fetch.js';
import { createMockStream } from '../utils/stream.js';

const METADATA_URL = 'https://updates.test/latest.json';

describe('sdk', () => {

    describe('buildRetryStrategy', () => {

        it('should return the preset when nothing is overridden', () => {

            expect(buildRetryStrategy({ preset: 'standard' }).equals(RetryStrategy.standard)).toBe(true);

        });

        it('should apply field overrides on top of the preset', () => {

            const strategy = buildRetryStrategy({ preset: 'fast', maxAttempts: 2, jitter: false });

            expect(strategy.maxAttempts).toBe(2);
            expect(strategy.enableJitter).toBe(false);
            expect(strategy.initialDelayMs).toBe(RetryStrategy.fast.initialDelayMs);

        });

    });

    describe('createUpdater', () => {

        it('should assemble a working updater from config', async () => {

            const server = new FakeFetch().route(METADATA_URL, () => jsonResponse({
                version: '2.0.0',
                downloadUrl: 'https://cdn.test/app.zip',
            }));
            const log = createMockStream();

            const updater = await createUpdater({
                config: {
                    currentVersion: '1.0.0',
                    updateUrl: METADATA_URL,
                    schedule: { intervalMs: 60_000 },
                },
                env: {},
                fetch: server.fetch,
                logStream: log.stream,
            });

            const [descriptor] = await updater.controller.checkForUpdate();

            expect(descriptor?.newVersion).toBe('2.0.0');
            expect(updater.config.retry.preset).toBe('standard');
            expect(updater.scheduler.isEnabled).toBe(true);
            expect(updater.logger.state).toBe('running');
            expect(log.text()).toContain('[check:complete] Update available: 1.0.0 -> 2.0.0');

            await updater.close();
            await updater.close();

            expect(updater.isClosed).toBe(true);
            expect(updater.transport.isClosed).toBe(true);
            expect(updater.logger.state).toBe('stopped');

        });

        it('should use a check callback instead of a URL', async () => {

            const updater = await createUpdater({
                config: { currentVersion: '1.0.0' },
                env: {},
                logStream: null,
                onCheckUpdate: async () => ({ version: '1.0.1', downloadUrl: 'https://cdn.test/app.zip' }),
            });

            const [descriptor, err] = await updater.controller.checkForUpdate();

            expect(err).toBeNull();
            expect(descriptor?.newVersion).toBe('1.0.1');

            await updater.close();

        });

        it('should reject a config without a metadata source', async () => {

            const attempt = createUpdater({ config: { currentVersion: '1.0.0' }, env: {}, logStream: null });

            await expect(attempt).rejects.toBeInstanceOf(UpdateError);
            await expect(attempt).rejects.toMatchObject({ code: 'MISSING_URL' });

        });

    });

});
