// src/io.ts
import fs from 'fs';

/** Blocking single-byte input. Throws when no byte can be produced. */
export interface ByteReader {
    readByte(): number;
}

/** Single-byte output. Throws when the byte could not be written. */
export interface ByteWriter {
    writeByte(byte: number): void;
}

export class EndOfStreamError extends Error {
    constructor(message = 'Unexpected end of input') {
        super(message);
        this.name = 'EndOfStreamError';
    }
}

const isRetryable = (err: unknown): boolean =>
    err instanceof Error && 'code' in err && err.code === 'EAGAIN';

export class FdReader implements ByteReader {
    private readonly buf = Buffer.alloc(1);

    constructor(private readonly fd: number = 0) { }

    readByte(): number {
        for (;;) {
            let read: number;
            try {
                read = fs.readSync(this.fd, this.buf, 0, 1, null);
            } catch (err) {
                // stdin may be non-blocking when attached to a pipe or TTY
                if (isRetryable(err)) continue;
                throw err;
            }
            if (read === 0) {
                throw new EndOfStreamError();
            }
            return this.buf[0];
        }
    }
}

export class FdWriter implements ByteWriter {
    constructor(private readonly fd: number = 1) { }

    writeByte(byte: number): void {
        const buf = Uint8Array.of(byte & 0xFF);
        let written = 0;
        while (written < 1) {
            try {
                written = fs.writeSync(this.fd, buf, 0, 1);
            } catch (err) {
                if (isRetryable(err)) continue;
                throw err;
            }
        }
    }
}

export class BufferReader implements ByteReader {
    private readonly bytes: Uint8Array;
    private offset = 0;

    constructor(bytes: Iterable<number> | string = []) {
        this.bytes = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Uint8Array.from(bytes);
    }

    get remaining(): number {
        return this.bytes.length - this.offset;
    }

    readByte(): number {
        if (this.offset >= this.bytes.length) {
            throw new EndOfStreamError();
        }
        return this.bytes[this.offset++];
    }
}

export class BufferWriter implements ByteWriter {
    private readonly chunks: number[] = [];

    writeByte(byte: number): void {
        this.chunks.push(byte & 0xFF);
    }

    get bytes(): Uint8Array {
        return Uint8Array.from(this.chunks);
    }

    toString(): string {
        return Buffer.from(this.chunks).toString('utf8');
    }
}
