import { describe, it, expect } from 'vitest';

import {
    HttpStatusError,
    UpdateError,
    classifyError,
    classifyRootError,
    errorMessage,
    isTransientError,
    isUpdateErrorCode,
    toUpdateError,
} from '../../../src/core/errors/index.js';

const ARTIFACT_URL = 'https://cdn.test/app.zip';

function systemError(code: string, message = code.toLowerCase()): Error {

    return Object.assign(new Error(message), { code });

}

describe('errors', () => {

    describe('UpdateError', () => {

        it('should serialize code, message and cause', () => {

            expect(new UpdateError('TIMEOUT', 'slow').toJSON()).toEqual({ code: 'TIMEOUT', message: 'slow' });
            expect(new UpdateError('FILE_ERROR', 'write failed', { cause: new Error('disk full') }).toJSON())
                .toEqual({ code: 'FILE_ERROR', message: 'write failed', cause: 'disk full' });

        });

        it('should carry its name', () => {

            expect(new UpdateError('NO_UPDATE', 'none').name).toBe('UpdateError');

        });

    });

    describe('HttpStatusError', () => {

        it('should describe the status and URL', () => {

            expect(new HttpStatusError(503, 'Service Unavailable', ARTIFACT_URL).message)
                .toBe(`HTTP 503 Service Unavailable for ${ARTIFACT_URL}`);
            expect(new HttpStatusError(500, '', ARTIFACT_URL).message).toBe(`HTTP 500 for ${ARTIFACT_URL}`);

        });

    });

    describe('isUpdateErrorCode', () => {

        it('should accept known codes only', () => {

            expect(isUpdateErrorCode('MD5_MISMATCH')).toBe(true);
            expect(isUpdateErrorCode('NOPE')).toBe(false);
            expect(isUpdateErrorCode(3)).toBe(false);

        });

    });

    describe('classifyError', () => {

        it('should classify update errors by code', () => {

            expect(classifyError(new UpdateError('TIMEOUT', 'slow'))).toBe('timeout');
            expect(classifyError(new UpdateError('SERVICE_UNAVAILABLE', 'busy'))).toBe('server');
            expect(classifyError(new UpdateError('MD5_MISMATCH', 'bad'))).toBe('fatal');

        });

        it('should defer to the cause for generic codes', () => {

            expect(classifyError(new UpdateError('DOWNLOAD_ERROR', 'x', { cause: new Error('y') }))).toBe('wrapped');
            expect(classifyError(new UpdateError('DOWNLOAD_ERROR', 'x'))).toBe('opaque');

        });

        it('should classify HTTP statuses', () => {

            expect(classifyError(new HttpStatusError(503, '', ARTIFACT_URL))).toBe('server');
            expect(classifyError(new HttpStatusError(404, '', ARTIFACT_URL))).toBe('client');
            expect(classifyError(new HttpStatusError(301, '', ARTIFACT_URL))).toBe('opaque');

        });

        it('should classify system errors', () => {

            expect(classifyError(systemError('ECONNRESET'))).toBe('network');
            expect(classifyError(systemError('UND_ERR_HEADERS_TIMEOUT'))).toBe('timeout');
            expect(classifyError(systemError('ENOSPC'))).toBe('filesystem');

        });

        it('should classify plain values', () => {

            expect(classifyError(new SyntaxError('Unexpected token'))).toBe('parse');
            expect(classifyError(new Error('outer', { cause: 'inner' }))).toBe('wrapped');
            expect(classifyError('just a string')).toBe('opaque');

        });

    });

    describe('classifyRootError', () => {

        it('should follow the cause chain', () => {

            const error = new TypeError('fetch failed', { cause: systemError('ECONNREFUSED') });

            expect(classifyRootError(error)).toBe('network');

        });

    });

    describe('isTransientError', () => {

        it('should trust retryable and non-retryable codes', () => {

            expect(isTransientError(new UpdateError('SERVER_ERROR', 'down'))).toBe(true);
            expect(isTransientError(new UpdateError('MD5_MISMATCH', 'bad'))).toBe(false);

        });

        it('should look through generic codes to the HTTP status', () => {

            const bad = new UpdateError('DOWNLOAD_ERROR', 'x', { cause: new HttpStatusError(502, 'Bad Gateway', ARTIFACT_URL) });
            const missing = new UpdateError('DOWNLOAD_ERROR', 'x', { cause: new HttpStatusError(404, 'Not Found', ARTIFACT_URL) });

            expect(isTransientError(bad)).toBe(true);
            expect(isTransientError(missing)).toBe(false);

        });

    });

    describe('toUpdateError', () => {

        it('should pass update errors through', () => {

            const error = new UpdateError('TIMEOUT', 'slow');

            expect(toUpdateError(error, 'NETWORK_ERROR', 'ignored')).toBe(error);

        });

        it('should derive the code from the failure class', () => {

            const cause = systemError('ECONNRESET', 'socket hang up');
            const error = toUpdateError(cause, 'DOWNLOAD_ERROR', 'Request failed');

            expect(error.code).toBe('NETWORK_ERROR');
            expect(error.message).toBe('Request failed: socket hang up');
            expect(error.cause).toBe(cause);

        });

        it('should map permission failures apart from other file errors', () => {

            expect(toUpdateError(systemError('EACCES')).code).toBe('PERMISSION_DENIED');
            expect(toUpdateError(systemError('ENOENT')).code).toBe('FILE_ERROR');

        });

        it('should use the fallback when the class says nothing', () => {

            expect(toUpdateError(new Error('boom'))).toMatchObject({ code: 'APPLICATION_ERROR', message: 'boom' });
            expect(toUpdateError('nope', 'PARSE_ERROR')).toMatchObject({ code: 'PARSE_ERROR', message: 'nope' });

        });

    });

    describe('errorMessage', () => {

        it('should read messages from any value', () => {

            expect(errorMessage(new Error('boom'))).toBe('boom');
            expect(errorMessage(42)).toBe('42');

        });

    });

});
