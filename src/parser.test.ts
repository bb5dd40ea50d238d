import { describe, it, expect } from 'vitest';
import { parseInstructions } from './parser.js';
import { ByteStream } from './stream.js';
import { AllocationError } from './errors.js';

const stream = (source: string) => new ByteStream(Buffer.from(source, 'latin1'));

describe('parseInstructions', () => {
  it('stores only command characters, followed by a zero end marker', () => {
    const store = parseInstructions(stream('+ a>\n[-]. # done,<'));
    expect(Array.from(store.snapshot())).toEqual([...Buffer.from('+>[-].,<'), 0]);
    expect(store.low).toBe(0);
    expect(store.high).toBe(8);
  });

  it('leaves a lone end marker for a program without commands', () => {
    const store = parseInstructions(stream('just a comment\n'));
    expect(store.size).toBe(1);
    expect(store.get(0)).toBe(0);
  });

  it('reads from the current position of the stream', () => {
    const s = stream('++');
    s.next();
    const store = parseInstructions(s);
    expect(Array.from(store.snapshot())).toEqual([43, 0]);
  });

  it('fails when the program does not fit in the limit', () => {
    expect(() => parseInstructions(stream('+++'), { limit: 3 })).toThrow(AllocationError);
    expect(parseInstructions(stream('+++'), { limit: 4 }).size).toBe(4);
  });
});
