import { describe, it, expect } from 'vitest';

import { classifyEvent, shouldLog } from '../../../src/core/logger/classifier.js';

describe('logger: classifier', () => {

    describe('classifyEvent', () => {

        it('should classify "error" as error level', () => {

            expect(classifyEvent('error')).toBe('error');

        });

        it('should classify events ending with :failed as error level', () => {

            expect(classifyEvent('check:failed')).toBe('error');
            expect(classifyEvent('download:failed')).toBe('error');
            expect(classifyEvent('install:failed')).toBe('error');

        });

        it('should classify warnings and retries as warn level', () => {

            expect(classifyEvent('download:warning')).toBe('warn');
            expect(classifyEvent('download:retry')).toBe('warn');

        });

        it('should classify lifecycle events as info level', () => {

            expect(classifyEvent('check:start')).toBe('info');
            expect(classifyEvent('download:complete')).toBe('info');
            expect(classifyEvent('download:paused')).toBe('info');
            expect(classifyEvent('download:verified')).toBe('info');
            expect(classifyEvent('config:loaded')).toBe('info');
            expect(classifyEvent('transport:open')).toBe('info');
            expect(classifyEvent('scheduler:started')).toBe('info');
            expect(classifyEvent('controller:status')).toBe('info');

        });

        it('should classify everything else as debug level', () => {

            expect(classifyEvent('download:progress')).toBe('debug');
            expect(classifyEvent('download:status')).toBe('debug');
            expect(classifyEvent('transport:request')).toBe('debug');
            expect(classifyEvent('scheduler:skipped')).toBe('debug');

        });

    });

    describe('shouldLog', () => {

        it('should log nothing when silent', () => {

            expect(shouldLog('error', 'silent')).toBe(false);

        });

        it('should log everything when verbose', () => {

            expect(shouldLog('download:progress', 'verbose')).toBe(true);

        });

        it('should filter by priority', () => {

            expect(shouldLog('download:failed', 'error')).toBe(true);
            expect(shouldLog('download:retry', 'error')).toBe(false);
            expect(shouldLog('download:retry', 'warn')).toBe(true);
            expect(shouldLog('check:start', 'warn')).toBe(false);
            expect(shouldLog('check:start', 'info')).toBe(true);
            expect(shouldLog('download:progress', 'info')).toBe(false);

        });

    });

});
