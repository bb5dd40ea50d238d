// src/stream.ts

/** Sequential reader over program source, read once per pass. */
export class ByteStream {
    private pos = 0;

    constructor(private readonly bytes: Uint8Array) { }

    next(): number | null {
        if (this.pos >= this.bytes.length) return null;
        return this.bytes[this.pos++] & 0xFF;
    }

    rewind(): void {
        this.pos = 0;
    }
}
