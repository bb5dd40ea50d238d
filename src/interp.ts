// src/interp.ts
import { Cells, grow, DEFAULT_LIMIT } from './cells.js';
import { checkBrackets } from './brackets.js';
import { UnmatchedBracketsError } from './errors.js';
import { stdio } from './io.js';
import { parseInstructions } from './parser.js';
import { ByteStream } from './stream.js';
import { CharCode, HALT, type EofPolicy, type Io } from './types.js';

export interface RunOptions {
    io?: Io;
    eof?: EofPolicy;
    /** Per-sequence cap on allocated positions. */
    limit?: number;
}

export interface RunResult {
    /** Tape contents from the leftmost to the rightmost allocated cell. */
    cells: Uint8Array;
    /** Index in `cells` of the cell the data pointer started on. */
    origin: number;
    /** Final data pointer, relative to the starting cell. */
    pointer: number;
    steps: number;
}

export class Interpreter {
    private ip = 0;
    private dp = 0;
    private count = 0;

    constructor(
        private readonly program: Cells,
        private readonly tape: Cells,
        private readonly io: Io,
        private readonly eof: EofPolicy = 'zero'
    ) { }

    get instructionPointer(): number {
        return this.ip;
    }

    get dataPointer(): number {
        return this.dp;
    }

    get steps(): number {
        return this.count;
    }

    run(): void {
        let op: number;
        while ((op = this.program.get(this.ip)) !== HALT) {
            switch (op) {
                case CharCode.GT:
                    this.dp = grow(this.tape.advance(this.dp));
                    break;
                case CharCode.LT:
                    this.dp = grow(this.tape.retreat(this.dp));
                    break;
                case CharCode.ADD:
                    this.tape.set(this.dp, (this.tape.get(this.dp) + 1) & 0xFF);
                    break;
                case CharCode.SUB:
                    this.tape.set(this.dp, (this.tape.get(this.dp) - 1) & 0xFF);
                    break;
                case CharCode.DOT:
                    this.io.write(this.tape.get(this.dp));
                    break;
                case CharCode.COMMA:
                    this.input();
                    break;
                case CharCode.LB:
                    if (this.tape.get(this.dp) === 0) this.skipForward();
                    break;
                case CharCode.RB:
                    if (this.tape.get(this.dp) !== 0) this.jumpBack();
                    break;
            }
            this.count++;
            this.ip = grow(this.program.advance(this.ip));
        }
    }

    private input(): void {
        const byte = this.io.read();
        if (byte !== null) {
            this.tape.set(this.dp, byte);
            return;
        }
        switch (this.eof) {
            case 'zero':
                this.tape.set(this.dp, 0);
                break;
            case 'max':
                this.tape.set(this.dp, 0xFF);
                break;
            case 'keep':
                break;
        }
    }

    // Leaves ip on the matching ']'; the main loop steps past it.
    private skipForward(): void {
        let depth = 1;
        while (depth !== 0) {
            this.ip = grow(this.program.advance(this.ip));
            const c = this.program.get(this.ip);
            if (c === CharCode.LB) depth++;
            else if (c === CharCode.RB) depth--;
        }
    }

    // Leaves ip on the matching '['.
    private jumpBack(): void {
        let depth = 1;
        while (depth !== 0) {
            this.ip = grow(this.program.retreat(this.ip));
            const c = this.program.get(this.ip);
            if (c === CharCode.LB) depth--;
            else if (c === CharCode.RB) depth++;
        }
    }
}

export const run = (bytes: Uint8Array, options: RunOptions = {}): RunResult => {
    const limit = options.limit ?? DEFAULT_LIMIT;
    const source = new ByteStream(bytes);
    if (!checkBrackets(source)) {
        throw new UnmatchedBracketsError();
    }
    source.rewind();

    const program = parseInstructions(source, { limit });
    const tape = new Cells({ limit });
    const interpreter = new Interpreter(program, tape, options.io ?? stdio, options.eof ?? 'zero');
    interpreter.run();

    const result: RunResult = {
        cells: tape.snapshot(),
        origin: -tape.low,
        pointer: interpreter.dataPointer,
        steps: interpreter.steps,
    };
    program.release();
    tape.release();
    return result;
};
