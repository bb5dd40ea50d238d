// src/types.ts
export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

// 0 never encodes an instruction, so it doubles as the end-of-program marker
export const HALT = 0;

const commands = new Set<number>([
  CharCode.LT,
  CharCode.GT,
  CharCode.ADD,
  CharCode.COMMA,
  CharCode.SUB,
  CharCode.DOT,
  CharCode.LB,
  CharCode.RB,
]);

export const isCommand = (c: number): boolean => commands.has(c);

export interface Ok<T> {
  ok: true;
  value: T;
}
export interface Err<E> {
  ok: false;
  error: E;
}
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/** What `,` stores once input is exhausted. */
export type EofPolicy = 'zero' | 'keep' | 'max';

export const EOF_POLICIES: readonly EofPolicy[] = ['zero', 'keep', 'max'];

export const isEofPolicy = (value: string): value is EofPolicy =>
  EOF_POLICIES.some(policy => policy === value);

export interface Io {
  /** Next input byte, or null once input is exhausted. */
  read(): number | null;
  write(byte: number): void;
}
