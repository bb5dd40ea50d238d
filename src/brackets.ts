// src/brackets.ts
import { ByteStream } from './stream.js';
import { CharCode } from './types.js';

/**
 * Checks that every '[' has a later ']' and vice versa by counting depth.
 * Reads the stream to the end when the program is balanced; rewind before parsing.
 */
export const checkBrackets = (stream: ByteStream): boolean => {
    let depth = 0;
    let c: number | null;
    while ((c = stream.next()) !== null) {
        if (c === CharCode.LB) depth++;
        if (c === CharCode.RB) depth--;
        if (depth < 0) return false; // unmatched ']'
    }
    return depth === 0;
};
