// src/io.ts
import fs from 'fs';
import { OutputClosedError } from './errors.js';
import type { Io } from './types.js';

const STDIN_FD = 0;
const STDOUT_FD = 1;
const RETRY_DELAY_MS = 10;

const errnoCode = (e: unknown): string | undefined =>
    e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;

// Blocks the thread; a descriptor inherited in non-blocking mode has to be polled.
const pause = (ms: number): void => {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

/** The synchronous descriptor calls the adapter needs, as `fs` provides them. */
export interface FdOps {
    readSync(fd: number, buffer: Uint8Array, offset: number, length: number): number;
    writeSync(fd: number, buffer: Uint8Array): number;
}

const fsOps: FdOps = {
    readSync: (fd, buffer, offset, length) => fs.readSync(fd, buffer, offset, length, null),
    writeSync: (fd, buffer) => fs.writeSync(fd, buffer),
};

/**
 * Blocking byte-at-a-time I/O on raw file descriptors. Goes through `fs`
 * rather than `process.stdin`/`process.stdout`: those getters switch pipes to
 * non-blocking mode, and their write errors only surface on a later tick.
 */
export const fdIo = (input: number, output: number, ops: FdOps = fsOps): Io => ({
    read(): number | null {
        const buf = Buffer.alloc(1);
        for (;;) {
            let bytesRead: number;
            try {
                bytesRead = ops.readSync(input, buf, 0, 1);
            } catch (e) {
                const code = errnoCode(e);
                // Windows reports end of a piped stdin as an error
                if (code === 'EOF') return null;
                if (code === 'EAGAIN') {
                    pause(RETRY_DELAY_MS);
                    continue;
                }
                throw e;
            }
            return bytesRead === 0 ? null : buf[0];
        }
    },
    write(byte: number): void {
        const buf = Uint8Array.of(byte);
        for (;;) {
            try {
                if (ops.writeSync(output, buf) === 1) return;
            } catch (e) {
                const code = errnoCode(e);
                if (code === 'EPIPE') throw new OutputClosedError();
                if (code !== 'EAGAIN') throw e;
            }
            pause(RETRY_DELAY_MS);
        }
    },
});

/** The process's standard input and output. */
export const stdio: Io = fdIo(STDIN_FD, STDOUT_FD);

/** In-memory input and output, for embedding and tests. */
export class BufferIo implements Io {
    private readonly input: Uint8Array;
    private pos = 0;
    private readonly out: number[] = [];

    constructor(input: string | Uint8Array = '') {
        this.input = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
    }

    read(): number | null {
        if (this.pos >= this.input.length) return null;
        return this.input[this.pos++];
    }

    write(byte: number): void {
        this.out.push(byte & 0xFF);
    }

    output(): Uint8Array {
        return Uint8Array.from(this.out);
    }

    // one character per byte
    text(): string {
        return Buffer.from(this.out).toString('latin1');
    }
}
