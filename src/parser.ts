// src/parser.ts
import { Cells, grow, type CellsOptions } from './cells.js';
import { ByteStream } from './stream.js';
import { isCommand } from './types.js';

// Everything that is not one of the eight commands is a comment.
export const parseInstructions = (stream: ByteStream, options: CellsOptions = {}): Cells => {
    const store = new Cells(options);
    let pos = 0;
    let c: number | null;
    while ((c = stream.next()) !== null) {
        if (!isCommand(c)) continue;
        store.set(pos, c);
        pos = grow(store.advance(pos));
    }
    // the last position stays 0 and marks the end of the program
    return store;
};
