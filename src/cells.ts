// src/cells.ts
import { AllocationError } from './errors.js';
import { ok, err, type Result } from './types.js';

export const DEFAULT_LIMIT = 2 ** 30;
const INITIAL_CAPACITY = 16;

export interface CellsOptions {
    /** Maximum number of positions the sequence may hold. */
    limit?: number;
}

type Side = 'left' | 'right';

/**
 * Byte sequence that is unbounded in both directions. Positions are signed
 * offsets from the origin; only [low, high] exists, and it grows one position at
 * a time as traversal steps past either end. Used for both the tape and the
 * instruction store.
 */
export class Cells {
    private buf: Uint8Array;
    // buffer index of position 0
    private origin: number;
    private lo = 0;
    private hi = 0;
    private readonly limit: number;

    constructor(options: CellsOptions = {}) {
        this.limit = options.limit ?? DEFAULT_LIMIT;
        this.buf = new Uint8Array(INITIAL_CAPACITY);
        this.origin = INITIAL_CAPACITY >> 1;
    }

    get low(): number {
        return this.lo;
    }

    get high(): number {
        return this.hi;
    }

    get size(): number {
        return this.hi - this.lo + 1;
    }

    get(pos: number): number {
        this.check(pos);
        return this.buf[this.origin + pos];
    }

    set(pos: number, value: number): void {
        this.check(pos);
        this.buf[this.origin + pos] = value & 0xFF;
    }

    advance(pos: number): Result<number, AllocationError> {
        this.check(pos);
        if (pos < this.hi) return ok(pos + 1);
        const room = this.reserve('right');
        if (!room.ok) return room;
        return ok(++this.hi);
    }

    retreat(pos: number): Result<number, AllocationError> {
        this.check(pos);
        if (pos > this.lo) return ok(pos - 1);
        const room = this.reserve('left');
        if (!room.ok) return room;
        return ok(--this.lo);
    }

    snapshot(): Uint8Array {
        return this.buf.slice(this.origin + this.lo, this.origin + this.hi + 1);
    }

    release(): void {
        this.buf = new Uint8Array(INITIAL_CAPACITY);
        this.origin = INITIAL_CAPACITY >> 1;
        this.lo = 0;
        this.hi = 0;
    }

    private check(pos: number): void {
        if (pos < this.lo || pos > this.hi) {
            throw new RangeError(`Position ${pos} is outside [${this.lo}, ${this.hi}]`);
        }
    }

    // Makes room for one more position on the given side, doubling the buffer
    // when that side is full.
    private reserve(side: Side): Result<undefined, AllocationError> {
        if (this.size >= this.limit) {
            return err(new AllocationError(`cell limit of ${this.limit} reached`));
        }
        const room = side === 'right'
            ? this.buf.length - (this.origin + this.hi) - 1
            : this.origin + this.lo;
        if (room > 0) return ok(undefined);

        const extra = this.buf.length;
        let next: Uint8Array;
        try {
            next = new Uint8Array(this.buf.length + extra);
        } catch (e) {
            if (e instanceof RangeError) return err(new AllocationError(e.message));
            throw e;
        }
        const shift = side === 'left' ? extra : 0;
        next.set(this.buf, shift);
        this.buf = next;
        this.origin += shift;
        return ok(undefined);
    }
}

/** Unwraps a growth result; allocation failure is fatal to the caller. */
export const grow = (result: Result<number, AllocationError>): number => {
    if (!result.ok) throw result.error;
    return result.value;
};
