#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { pathToFileURL } from 'url';
import { BfError, OutputClosedError } from './errors.js';
import { BF_EXTENSION, validateFileExtension } from './extension.js';
import { run } from './interp.js';
import { stdio } from './io.js';
import { isEofPolicy, type EofPolicy, type Io } from './types.js';

export const USAGE = `Usage: bf [options] <file.${BF_EXTENSION}>

Options:
  --eof, -e      End-of-input policy: 'zero', 'keep' or 'max' [default: zero]
  --time, -t     Show execution time
  --help, -h     Show this help`;

/** Everything the CLI touches outside its own arguments. */
export interface CliHost {
    readFile(path: string): Uint8Array;
    io: Io;
    log(message: string): void;
    error(message: string): void;
    now(): bigint;
}

export const nodeHost: CliHost = {
    readFile: path => fs.readFileSync(path),
    io: stdio,
    log: message => console.log(message),
    error: message => console.error(message),
    now: () => process.hrtime.bigint(),
};

export function main(args: string[], host: CliHost = nodeHost): number {
    let eof: EofPolicy = 'zero';
    let showTime = false;
    const files: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            host.log(USAGE);
            return 0;
        } else if (arg === '--eof' || arg === '-e') {
            i++;
            const value = i < args.length ? args[i] : '';
            if (!isEofPolicy(value)) {
                host.error('Invalid EOF policy. Use "zero", "keep" or "max"');
                return 1;
            }
            eof = value;
        } else if (arg === '--time' || arg === '-t') {
            showTime = true;
        } else if (arg.startsWith('-')) {
            host.error(`Unknown option: ${arg}`);
            host.log(USAGE);
            return 1;
        } else {
            files.push(arg);
        }
    }

    if (files.length !== 1) {
        host.log(USAGE);
        return 1;
    }
    const [file] = files;

    if (!validateFileExtension(file, BF_EXTENSION)) {
        host.error(`Invalid file extension. Please provide a '${BF_EXTENSION}' file.`);
        return 1;
    }

    let content: Uint8Array;
    try {
        content = host.readFile(file);
    } catch (err) {
        host.error(`Error opening file: ${file} (${err instanceof Error ? err.message : 'Unknown error'})`);
        return 1;
    }

    const start = host.now();
    try {
        run(content, { io: host.io, eof });
    } catch (err) {
        // nobody is left to read a message, as after SIGPIPE
        if (err instanceof OutputClosedError) return 1;
        if (err instanceof BfError) {
            host.error(`Error: ${err.message}`);
            return 1;
        }
        throw err;
    }

    if (showTime) {
        const timeMs = Number(host.now() - start) / 1e6;
        host.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
    }
    return 0;
}

const entry = process.argv[1];
if (entry !== undefined && fs.existsSync(entry) && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href) {
    process.exitCode = main(process.argv.slice(2));
}
