// src/index.ts
export { run, Interpreter } from './interp.js';
export type { RunOptions, RunResult } from './interp.js';
export { Cells, DEFAULT_LIMIT } from './cells.js';
export type { CellsOptions } from './cells.js';
export { checkBrackets } from './brackets.js';
export { parseInstructions } from './parser.js';
export { ByteStream } from './stream.js';
export { BufferIo, stdio, fdIo } from './io.js';
export type { FdOps } from './io.js';
export { validateFileExtension, BF_EXTENSION } from './extension.js';
export { BfError, UnmatchedBracketsError, AllocationError, OutputClosedError } from './errors.js';
export { CharCode, isEofPolicy } from './types.js';
export type { EofPolicy, Io, Result } from './types.js';
