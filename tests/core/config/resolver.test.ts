/**
 * Config resolver tests.
 */
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, it, expect, beforeEach, afterEach } from 'vitest'

import {
    ConfigValidationError,
    loadConfigFile,
    pruneUndefined,
    resolveConfig,
} from '../../../src/core/config/index.js'
import { createObserver } from '../../../src/core/observer.js'


const FILE_CONTENT = [
    'currentVersion: 1.9.0',
    'updateUrl: https://updates.test/latest.json',
    'retry:',
    '  preset: conservative',
    '  maxAttempts: 2',
    '',
].join('\n')


describe('config: resolver', () => {

    let tempDir: string
    let configPath: string

    beforeEach(async () => {

        tempDir = await mkdtemp(join(tmpdir(), 'updater-test-'))
        configPath = join(tempDir, 'updater.yml')

        await writeFile(configPath, FILE_CONTENT)
    })

    afterEach(async () => {

        await rm(tempDir, { recursive: true, force: true })
    })

    describe('pruneUndefined', () => {

        it('should drop undefined values at every depth', () => {

            expect(pruneUndefined({ a: 1, b: undefined, c: { d: undefined, e: 'x' } }))
                .toEqual({ a: 1, c: { e: 'x' } })
        })
    })

    describe('loadConfigFile', () => {

        it('should parse a YAML mapping', async () => {

            expect(await loadConfigFile(configPath)).toEqual({
                currentVersion: '1.9.0',
                updateUrl: 'https://updates.test/latest.json',
                retry: { preset: 'conservative', maxAttempts: 2 },
            })
        })

        it('should treat an empty file as an empty layer', async () => {

            const path = join(tempDir, 'empty.yml')

            await writeFile(path, '')

            expect(await loadConfigFile(path)).toEqual({})
        })

        it('should reject a file that is not a mapping', async () => {

            const path = join(tempDir, 'list.yml')

            await writeFile(path, '- one\n- two\n')

            await expect(loadConfigFile(path)).rejects.toThrow(`Config file ${path} must contain a mapping`)
        })

        it('should reject a missing file', async () => {

            const path = join(tempDir, 'missing.yml')

            await expect(loadConfigFile(path)).rejects.toThrow(`Failed to read config file ${path}`)
        })
    })

    describe('resolveConfig', () => {

        it('should layer file, env and overrides', async () => {

            const observer = createObserver('resolver-test')
            const loaded: Array<{ path: string | null; sources: string[] }> = []

            observer.on('config:loaded', (data) => loaded.push(data))

            const config = await resolveConfig({
                file: configPath,
                env: { UPDATER_RETRY_PRESET: 'fast' },
                overrides: { currentVersion: '2.0.0', updateUrl: undefined },
                observer,
            })

            expect(config.currentVersion).toBe('2.0.0')
            expect(config.updateUrl).toBe('https://updates.test/latest.json')
            expect(config.retry).toEqual({ preset: 'fast', maxAttempts: 2 })
            expect(loaded).toEqual([{ path: configPath, sources: ['defaults', 'file', 'env', 'overrides'] }])
        })

        it('should find the file through UPDATER_CONFIG', async () => {

            const config = await resolveConfig({ env: { UPDATER_CONFIG: configPath } })

            expect(config.retry.preset).toBe('conservative')
        })

        it('should resolve from env alone', async () => {

            const config = await resolveConfig({
                env: {
                    UPDATER_CURRENT_VERSION: '1.0.0',
                    UPDATER_METHOD: 'post',
                },
            })

            expect(config.currentVersion).toBe('1.0.0')
            expect(config.method).toBe('POST')
        })

        it('should validate the merged result', async () => {

            await expect(resolveConfig({ env: {} })).rejects.toBeInstanceOf(ConfigValidationError)
        })
    })
})
