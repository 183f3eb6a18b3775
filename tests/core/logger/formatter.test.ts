import { describe, it, expect } from 'vitest'

import { formatEntry, generateMessage, sanitizeData, serializeEntry } from '../../../src/core/logger/formatter.js'


describe('logger: formatter', () => {

    describe('generateMessage', () => {

        it('should use the template for known events', () => {

            expect(generateMessage('download:paused', { url: 'https://cdn.test/app.zip', downloaded: 600 }))
                .toBe('Download paused at 600 B')

            expect(generateMessage('check:complete', {
                currentVersion: '1.9.0',
                newVersion: '1.10.0',
                available: true,
                durationMs: 12,
            })).toBe('Update available: 1.9.0 -> 1.10.0 (12ms)')

            expect(generateMessage('check:complete', {
                currentVersion: '1.10.0',
                newVersion: null,
                available: false,
                durationMs: 3,
            })).toBe('Up to date at 1.10.0 (3ms)')
        })

        it('should format progress with speed and eta', () => {

            const message = generateMessage('download:progress', {
                url: 'https://cdn.test/app.zip',
                downloaded: 600,
                total: 1000,
                percent: 60,
                speed: 1536,
                eta: 125,
            })

            expect(message).toBe('600 B of 1000 B (60%) at 1.5 KB/s, 2m 5s left')
        })

        it('should report unknown speed and eta', () => {

            const message = generateMessage('download:progress', { downloaded: 0, total: 0, percent: 0 })

            expect(message).toBe('0 B of 0 B (0%) at unknown, unknown left')
        })

        it('should mention the resume offset', () => {

            expect(generateMessage('download:start', { url: 'https://cdn.test/app.zip', offset: 600, attempt: 2 }))
                .toBe('Downloading https://cdn.test/app.zip from byte 600 (attempt 2)')

            expect(generateMessage('download:start', { url: 'https://cdn.test/app.zip', offset: 0, attempt: 1 }))
                .toBe('Downloading https://cdn.test/app.zip (attempt 1)')
        })

        it('should unwrap errors in the generic error event', () => {

            expect(generateMessage('error', { source: 'scheduler', error: new Error('boom') }))
                .toBe('Error in scheduler: boom')
        })

        it('should fall back to key=value pairs for unknown events', () => {

            expect(generateMessage('custom:thing', { a: 1, b: 'x', c: [1, 2], d: true }))
                .toBe('custom thing: a=1, b="x", c=[2 items]')
        })

        it('should use the event name alone without data', () => {

            expect(generateMessage('custom:thing', {})).toBe('custom thing')
        })

        it('should truncate long strings in the fallback', () => {

            const message = generateMessage('custom:thing', { text: 'x'.repeat(60) })

            expect(message).toBe(`custom thing: text="${'x'.repeat(47)}..."`)
        })
    })

    describe('formatEntry', () => {

        it('should build a classified entry with data and context', () => {

            const entry = formatEntry('check:failed', { code: 'TIMEOUT', error: 'timed out' }, { app: 'desktop' }, true)

            expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)
            expect(entry).toMatchObject({
                level: 'error',
                event: 'check:failed',
                message: 'Update check failed [TIMEOUT]: timed out',
                data: { code: 'TIMEOUT', error: 'timed out' },
                context: { app: 'desktop' },
            })
        })

        it('should leave out data unless asked and empty context', () => {

            const entry = formatEntry('download:paused', { downloaded: 600 }, {})

            expect(entry.data).toBeUndefined()
            expect(entry.context).toBeUndefined()
        })
    })

    describe('sanitizeData', () => {

        it('should make errors, dates and circular values JSON-safe', () => {

            const circular: Record<string, unknown> = {}

            circular['self'] = circular

            const result = sanitizeData({
                error: new Error('boom'),
                when: new Date('2026-01-01T00:00:00.000Z'),
                circular,
                count: 3,
            })

            expect(result['error']).toMatchObject({ name: 'Error', message: 'boom' })
            expect(result['when']).toBe('2026-01-01T00:00:00.000Z')
            expect(result['circular']).toBe('[object Object]')
            expect(result['count']).toBe(3)
        })
    })

    describe('serializeEntry', () => {

        it('should write one JSON line', () => {

            const line = serializeEntry({
                timestamp: '2026-01-01T00:00:00.000Z',
                level: 'info',
                event: 'install:complete',
                message: 'Installed 2.0.0',
            })

            expect(line).toBe('{"timestamp":"2026-01-01T00:00:00.000Z","level":"info","event":"install:complete","message":"Installed 2.0.0"}\n')
        })
    })
})
