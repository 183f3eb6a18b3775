import { Writable } from 'node:stream';

/**
 * Create a writable stream that captures output.
 */
export function createMockStream(): { stream: Writable; output: string[]; text: () => string } {

    const output: string[] = [];
    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            output.push(chunk.toString());
            callback();

        },
    });

    return { stream, output, text: () => output.join('') };

}
